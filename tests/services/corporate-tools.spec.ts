import { describe, expect, it } from 'vitest';
import { resultText } from '../../src/core/lane-executor.js';
import { createCorporateHost } from '../harness/in-process-host.js';

async function callJson(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  const { host } = createCorporateHost();
  const result = await host.callTool(name, args);
  expect(result.isError).toBe(false);
  return JSON.parse(resultText(result));
}

describe('corporate tools', () => {
  it('list_tools describes every tool with its parameter names', async () => {
    const listing = await callJson('list_tools');

    expect(listing).toMatchObject({
      total_count: 5,
      description: 'Complete list of the tools this host exposes',
    });
    expect(listing).toHaveProperty('available_tools.2', {
      name: 'schedule_meeting',
      description: 'Schedule a meeting at a given date and time.',
      parameters: ['date', 'time', 'title', 'duration'],
    });
  });

  it('get_available_slots returns the week with weekdays and the timezone note', async () => {
    const slots = await callJson('get_available_slots');

    expect(slots).toMatchObject({
      note: 'All times are Moscow time (UTC+3).',
      booking_instruction: "Use the 'schedule_meeting' tool to book a slot",
    });
    expect(slots).toHaveProperty('available_slots.0', {
      date: '2024-01-15',
      available_times: ['10:00-12:00', '16:00-18:00'],
      day_of_week: 'Monday',
    });
  });

  it('schedule_meeting accepts a duration sent as a string', async () => {
    const { host, calendar } = createCorporateHost();

    const result = await host.callTool('schedule_meeting', {
      date: '2024-01-16',
      time: '09:30',
      title: 'Standup',
      duration: '30',
    });

    expect(JSON.parse(resultText(result))).toEqual({
      success: true,
      message: "Meeting 'Standup' scheduled for 2024-01-16 at 09:30",
      meeting_id: 'meeting_20240116_0930',
    });
    expect(calendar.bookings()[0]?.duration).toBe(30);
  });

  it('schedule_meeting reports missing arguments as a failed call', async () => {
    const { host } = createCorporateHost();

    await expect(host.callTool('schedule_meeting', { date: '2024-01-16', time: '09:30' })).resolves.toEqual({
      isError: true,
      content: [{ type: 'text', text: "'title' must be a non-empty string." }],
    });
    await expect(
      host.callTool('schedule_meeting', { date: '2024-01-16', time: '09:30', title: 'Sync', duration: 'long' }),
    ).resolves.toMatchObject({ isError: true, content: [{ text: "'duration' must be a number of minutes." }] });
  });

  it('get_development_plan returns the plan as stored', async () => {
    await expect(callJson('get_development_plan')).resolves.toMatchObject({
      current_level: 'Junior Developer',
      target_level: 'Middle Developer',
    });
  });

  it('search_regulations returns matches with their count', async () => {
    const found = await callJson('search_regulations', { query: 'remote' });

    expect(found).toMatchObject({ search_query: 'remote', found_count: 2 });
    expect(found).toHaveProperty('results.0.topic', 'remote_work');
  });

  it('search_regulations suggests keywords when nothing matches', async () => {
    await expect(callJson('search_regulations', { query: 'xyzzy' })).resolves.toEqual({
      message: 'Nothing matched your query',
      suggestion: 'Try keywords such as: vacation, sick leave, dress code, remote, learning, equipment',
    });
  });

  it('search_regulations refuses an empty query', async () => {
    const { host } = createCorporateHost();

    await expect(host.callTool('search_regulations', { query: ' ' })).resolves.toEqual({
      isError: true,
      content: [{ type: 'text', text: 'A search query is required.' }],
    });
  });
});
