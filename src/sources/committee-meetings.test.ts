import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CommitteeMeetingClient, fetchCommitteeMeetings, parseMeeting } from './committee-meetings.js';
import { TrackerSettingsSchema } from '../types/index.js';
import { createFakeLogger, jsonResponse, textResponse } from '../../tests/helpers/fixtures.js';

const mockFetch = vi.fn();
global.fetch = mockFetch;

const NOW = new Date('2025-03-10T12:00:00.000Z');
const committees = new Map([['hspw00', 'House Transportation & Infrastructure']]);

describe('parseMeeting', () => {
  it('should split date and time and collect details', () => {
    const meeting = parseMeeting(
      {
        eventId: '118001',
        type: 'Hearing',
        title: 'Levee Oversight',
        date: '2025-03-12T14:30:00Z',
        chamber: 'House',
        congress: 119,
        location: { building: 'Rayburn House Office Building', room: '2167' },
        committees: [{ systemCode: 'hspw00' }],
        witnesses: [{ name: 'Jane Witness' }, {}],
        relatedItems: { bills: [{ type: 'hr', number: 100 }, { type: 's' }] },
      },
      'hspw00',
      committees,
      119
    );

    expect(meeting).toEqual({
      eventId: '118001',
      committeeCode: 'hspw00',
      committeeName: 'House Transportation & Infrastructure',
      meetingType: 'Hearing',
      title: 'Levee Oversight',
      date: '2025-03-12',
      time: '14:30',
      location: 'Rayburn House Office Building 2167',
      url: 'https://www.congress.gov/event/119th-congress/house-event/118001',
      witnesses: ['Jane Witness'],
      relatedBills: ['HR 100'],
    });
  });

  it('should fall back to the name and leave time and location empty', () => {
    const meeting = parseMeeting(
      { eventId: '5', name: 'Business Meeting', date: '2025-03-12', committees: [] },
      'zz00',
      committees,
      119
    );

    expect(meeting.title).toBe('Business Meeting');
    expect(meeting.meetingType).toBe('Meeting');
    expect(meeting.time).toBeNull();
    expect(meeting.location).toBeNull();
    expect(meeting.committeeName).toBe('zz00');
  });
});

describe('CommitteeMeetingClient', () => {
  let client: CommitteeMeetingClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new CommitteeMeetingClient({
      apiKey: 'test-key',
      apiBase: 'https://api.congress.example/v3',
      retries: 0,
      retryDelayMs: 0,
      logger: createFakeLogger(),
    });
  });

  it('should keep tracked committees inside the window, newest first', async () => {
    const detail = (eventId: string, date: string, systemCode: string) =>
      jsonResponse({
        committeeMeeting: { eventId, date, title: `Meeting ${eventId}`, chamber: 'House', committees: [{ systemCode }] },
      });

    mockFetch.mockImplementation(async (input: URL) => {
      const path = input.pathname;
      if (path === '/v3/committee-meeting/119/house') {
        return jsonResponse({ committeeMeetings: [{ eventId: 1 }, { eventId: 2 }, { eventId: 3 }, { eventId: 4 }] });
      }
      if (path === '/v3/committee-meeting/119/senate') {
        // Repeats event 1, which is only fetched once
        return jsonResponse({ committeeMeetings: [{ eventId: '1' }] });
      }
      const responses: Record<string, Response> = {
        '/v3/committee-meeting/119/house/1': detail('1', '2025-03-05T10:00:00Z', 'HSPW00'),
        '/v3/committee-meeting/119/house/2': detail('2', '2025-03-12T10:00:00Z', 'hspw00'),
        '/v3/committee-meeting/119/house/3': detail('3', '2025-01-01T10:00:00Z', 'hspw00'),
        '/v3/committee-meeting/119/house/4': detail('4', '2025-03-11T10:00:00Z', 'hsag00'),
      };
      return responses[path] ?? textResponse('missing', 404);
    });

    const settings = TrackerSettingsSchema.parse({
      committees: {
        tracked_committees: [{ code: 'hspw00', name: 'House Transportation & Infrastructure' }],
        meetings_days_back: 14,
      },
    });

    const meetings = await fetchCommitteeMeetings(client, settings, NOW);

    expect(meetings.map((m) => [m.eventId, m.date])).toEqual([
      ['2', '2025-03-12'],
      ['1', '2025-03-05'],
    ]);
    expect(mockFetch).toHaveBeenCalledTimes(6);
  });

  it('should treat a failed listing as no meetings', async () => {
    mockFetch.mockResolvedValue(textResponse('down', 500));

    await expect(client.getMeetingList(119, 'house')).resolves.toEqual([]);
  });
});
