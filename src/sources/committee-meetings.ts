import { z } from 'zod';
import { CongressApiBase, ordinal, type CongressApiOptions } from './congress-api.js';
import type { CommitteeMeeting } from './types.js';
import type { TrackerSettings } from '../types/index.js';
import { daysAgo } from '../utils/dates.js';

export type Chamber = 'house' | 'senate';

const CHAMBERS: readonly Chamber[] = ['house', 'senate'];

const MeetingListResponseSchema = z.object({
  committeeMeetings: z.array(z.unknown()).default([]),
});

const MeetingListItemSchema = z.object({
  eventId: z.union([z.string(), z.number()]).transform(String),
});

export const RawMeetingSchema = z.object({
  eventId: z.union([z.string(), z.number()]).transform(String),
  type: z.string().optional(),
  title: z.string().optional(),
  name: z.string().optional(),
  /** ISO timestamp, e.g. 2026-01-22T16:15:00Z */
  date: z.string().optional(),
  chamber: z.string().optional(),
  congress: z.number().int().optional(),
  location: z
    .object({
      building: z.string().optional(),
      room: z.string().optional(),
    })
    .nullish(),
  committees: z.array(z.object({ systemCode: z.string().optional(), name: z.string().optional() })).default([]),
  witnesses: z.array(z.object({ name: z.string().optional() })).nullish(),
  relatedItems: z
    .object({
      bills: z
        .array(z.object({ type: z.string().optional(), number: z.union([z.string(), z.number()]).optional() }))
        .nullish(),
    })
    .nullish(),
});

export type RawMeeting = z.infer<typeof RawMeetingSchema>;

const MeetingDetailResponseSchema = z.object({
  committeeMeeting: z.unknown().optional(),
});

/**
 * Tracked committees keyed by lowercase system code
 */
export type CommitteeNames = ReadonlyMap<string, string>;

/**
 * Normalise meeting details for a tracked committee
 */
export function parseMeeting(
  raw: RawMeeting,
  committeeCode: string,
  committees: CommitteeNames,
  fallbackCongress: number
): CommitteeMeeting {
  const when = raw.date ?? '';
  const chamber = (raw.chamber ?? '').toLowerCase();
  const congress = raw.congress ?? fallbackCongress;
  const location = raw.location ? `${raw.location.building ?? ''} ${raw.location.room ?? ''}`.trim() : '';

  return {
    eventId: raw.eventId,
    committeeCode,
    committeeName: committees.get(committeeCode) ?? committeeCode,
    meetingType: raw.type ?? 'Meeting',
    title: raw.title || raw.name || 'Committee Meeting',
    date: when.slice(0, 10),
    time: when.length > 11 ? when.slice(11, 16) : null,
    location: location || null,
    url: `https://www.congress.gov/event/${ordinal(congress)}-congress/${chamber}-event/${raw.eventId}`,
    witnesses: (raw.witnesses ?? []).flatMap((witness) => (witness.name ? [witness.name] : [])),
    relatedBills: (raw.relatedItems?.bills ?? []).flatMap((bill) => {
      const type = (bill.type ?? '').toUpperCase();
      const number = bill.number === undefined ? '' : String(bill.number);
      return type && number ? [`${type} ${number}`] : [];
    }),
  };
}

/**
 * Client for the Congress.gov committee-meeting endpoints
 */
export class CommitteeMeetingClient extends CongressApiBase {
  constructor(options: CongressApiOptions) {
    super('committee-meetings', options);
  }

  /**
   * Event ids of a chamber's meetings. A failed listing yields none.
   */
  async getMeetingList(congress: number, chamber: Chamber, limit = 100): Promise<string[]> {
    try {
      const data = await this.request(`committee-meeting/${congress}/${chamber}`, MeetingListResponseSchema, {
        limit,
      });
      return this.parseEach(data.committeeMeetings, MeetingListItemSchema, 'meeting list item').map(
        (item) => item.eventId
      );
    } catch (error) {
      this.logger.error(
        { chamber, error: error instanceof Error ? error.message : String(error) },
        'Failed to fetch committee meetings'
      );
      return [];
    }
  }

  async getMeetingDetails(congress: number, chamber: Chamber, eventId: string): Promise<RawMeeting | null> {
    try {
      const data = await this.request(
        `committee-meeting/${congress}/${chamber}/${eventId}`,
        MeetingDetailResponseSchema
      );
      if (data.committeeMeeting === undefined) {
        return null;
      }
      const [meeting] = this.parseEach([data.committeeMeeting], RawMeetingSchema, 'meeting');
      return meeting ?? null;
    } catch (error) {
      this.logger.debug(
        { eventId, error: error instanceof Error ? error.message : String(error) },
        'Failed to fetch meeting details'
      );
      return null;
    }
  }

  /**
   * Meetings of tracked committees on or after the cutoff, newest first
   */
  async getTrackedMeetings(
    congress: number,
    committees: CommitteeNames,
    daysBack: number,
    now: Date = new Date()
  ): Promise<CommitteeMeeting[]> {
    const cutoff = daysAgo(now, daysBack);
    const meetings: CommitteeMeeting[] = [];
    const seen = new Set<string>();

    for (const chamber of CHAMBERS) {
      const eventIds = await this.getMeetingList(congress, chamber);
      this.logger.info({ chamber, count: eventIds.length }, 'Fetching meeting details');

      for (const eventId of eventIds) {
        if (seen.has(eventId)) {
          continue;
        }
        seen.add(eventId);

        const details = await this.getMeetingDetails(congress, chamber, eventId);
        if (!details) {
          continue;
        }

        const tracked = details.committees
          .map((committee) => (committee.systemCode ?? '').toLowerCase())
          .find((code) => committees.has(code));
        if (!tracked || !details.date || details.date.slice(0, 10) < cutoff) {
          continue;
        }
        meetings.push(parseMeeting(details, tracked, committees, congress));
      }
    }

    meetings.sort((a, b) => b.date.localeCompare(a.date));
    this.logger.info({ count: meetings.length }, 'Found meetings from tracked committees');
    return meetings;
  }
}

/**
 * Fetch meetings for the committees named in the settings
 */
export function fetchCommitteeMeetings(
  client: Pick<CommitteeMeetingClient, 'getTrackedMeetings'>,
  settings: TrackerSettings,
  now: Date = new Date()
): Promise<CommitteeMeeting[]> {
  const committees = new Map(
    settings.committees.tracked_committees.map((committee) => [committee.code.toLowerCase(), committee.name])
  );
  return client.getTrackedMeetings(
    settings.congress.current_congress,
    committees,
    settings.committees.meetings_days_back,
    now
  );
}
