import { z } from 'zod';

// ============================================================
// Configuration Types
// ============================================================

export const ConfigSchema = z.object({
  congress: z.object({
    apiKey: z.string().optional(),
    apiBase: z.string().url(),
  }),
  federalRegister: z.object({
    apiBase: z.string().url(),
  }),
  openFema: z.object({
    apiBase: z.string().url(),
  }),
  sendgrid: z.object({
    apiKey: z.string().optional(),
  }),
  paths: z.object({
    settings: z.string().min(1),
    watchlist: z.string().min(1),
    state: z.string().min(1),
    digestDir: z.string().min(1),
  }),
  http: z.object({
    timeoutMs: z.number().min(1000).max(300000),
    retries: z.number().min(0).max(10),
    retryDelayMs: z.number().min(0).max(60000),
  }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  logPretty: z.boolean(),
});

export type Config = z.infer<typeof ConfigSchema>;

// ============================================================
// Tracker Settings (data/config.yaml)
// ============================================================

export const PriorityKeywordsSchema = z.object({
  critical: z.array(z.string()).default([]),
  high: z.array(z.string()).default([]),
});

export type PriorityKeywords = z.infer<typeof PriorityKeywordsSchema>;

export const TrackerSettingsSchema = z.object({
  congress: z
    .object({
      current_congress: z.number().int().positive().default(119),
      recent_limit: z.number().int().min(1).max(250).default(250),
      title_keywords: z.array(z.string()).default([]),
      relevant_policy_areas: z.array(z.string()).default([]),
      relevant_subjects: z.array(z.string()).default([]),
      priority_keywords: PriorityKeywordsSchema.default({}),
    })
    .default({}),
  federal_register: z
    .object({
      agencies: z
        .array(z.object({ slug: z.string().min(1), name: z.string().optional() }))
        .default([]),
      document_types: z.array(z.string()).default(['Proposed Rule', 'Rule', 'Notice']),
      comment_warning_days: z.number().int().min(0).default(7),
      days_back: z.number().int().min(1).default(7),
    })
    .default({}),
  committees: z
    .object({
      rss_feeds: z
        .array(
          z.object({
            name: z.string().min(1),
            url: z.string().url(),
            keywords: z.array(z.string()).default([]),
          })
        )
        .default([]),
      tracked_committees: z
        .array(z.object({ code: z.string().min(1), name: z.string().min(1) }))
        .default([]),
      meetings_days_back: z.number().int().min(1).default(14),
    })
    .default({}),
  disasters: z
    .object({
      days_back: z.number().int().min(1).default(7),
      limit: z.number().int().min(1).max(1000).default(100),
      incident_types: z
        .array(z.string())
        .default([
          'Flood',
          'Severe Storm',
          'Hurricane',
          'Coastal Storm',
          'Severe Storm(s)',
          'Typhoon',
          'Dam/Levee Break',
          'Tornado',
          'Mud/Landslide',
        ]),
    })
    .default({}),
  notifications: z
    .object({
      email_recipients: z.array(z.string().email()).default([]),
      from_email: z.string().email().default('noreply@example.com'),
    })
    .default({}),
});

export type TrackerSettings = z.infer<typeof TrackerSettingsSchema>;

/**
 * Priority tag attached to bills and committee items
 */
export type Priority = 'critical' | 'high' | 'normal';
