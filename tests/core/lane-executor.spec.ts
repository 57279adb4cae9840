import { describe, expect, it, vi } from 'vitest';
import { RpcError, TransportClosedError } from '../../src/core/errors.js';
import { LaneExecutor, resultText, toolErrorText, type ToolInvoker } from '../../src/core/lane-executor.js';
import type { ToolResult } from '../../src/core/types.js';

function ok(text: string): ToolResult {
  return { isError: false, content: [{ type: 'text', text }] };
}

describe('LaneExecutor', () => {
  it('runs calls one after another in the given order', async () => {
    const order: string[] = [];
    const invoker: ToolInvoker = {
      callTool: async (name) => {
        order.push(`start:${name}`);
        await new Promise((resolve) => setTimeout(resolve, name === 'slow' ? 10 : 0));
        order.push(`end:${name}`);
        return ok(name);
      },
    };

    const outcomes = await new LaneExecutor(invoker).executeToolCalls([
      { toolName: 'slow', arguments: {} },
      { toolName: 'fast', arguments: {} },
    ]);

    expect(order).toEqual(['start:slow', 'end:slow', 'start:fast', 'end:fast']);
    expect(outcomes.map((outcome) => outcome.text)).toEqual(['slow', 'fast']);
  });

  it('turns error results and thrown errors into error text and carries on', async () => {
    const callTool = vi
      .fn<ToolInvoker['callTool']>()
      .mockResolvedValueOnce({ isError: true, content: [{ type: 'text', text: 'Unknown tool: nope' }] })
      .mockRejectedValueOnce(new RpcError(-32603, 'host fault'))
      .mockResolvedValueOnce(ok('fine'));

    const outcomes = await new LaneExecutor({ callTool }).executeToolCalls([
      { toolName: 'nope', arguments: {} },
      { toolName: 'broken', arguments: {} },
      { toolName: 'list_tools', arguments: {} },
    ]);

    expect(outcomes.map(({ isError, text }) => ({ isError, text }))).toEqual([
      { isError: true, text: 'Error executing nope: Unknown tool: nope' },
      { isError: true, text: 'Error executing broken: host fault' },
      { isError: false, text: 'fine' },
    ]);
  });

  it('aborts the batch when the transport is gone', async () => {
    const callTool = vi.fn<ToolInvoker['callTool']>().mockRejectedValue(new TransportClosedError('Stream ended.'));

    await expect(
      new LaneExecutor({ callTool }).executeToolCalls([
        { toolName: 'first', arguments: {} },
        { toolName: 'second', arguments: {} },
      ]),
    ).rejects.toBeInstanceOf(TransportClosedError);
    expect(callTool).toHaveBeenCalledTimes(1);
  });
});

describe('result helpers', () => {
  it('joins text blocks and formats tool errors', () => {
    expect(resultText({ isError: false, content: [{ type: 'text', text: 'a' }, { type: 'text', text: 'b' }] })).toBe('a\nb');
    expect(toolErrorText('echo', 'bad input')).toBe('Error executing echo: bad input');
  });
});
