import { z } from 'zod';

export const BACKEND_TYPES = [
  'standard',
  'iframe',
  'url_pagination',
  'custom_click',
  'custom_navigation'
] as const;

export const BackendTypeSchema = z.enum(BACKEND_TYPES);

export type BackendType = z.infer<typeof BackendTypeSchema>;

export const SelectorsSchema = z.object({
  job_link: z.string().optional(),
  next_page: z.string().optional(),
  next_page_disabled: z.string().optional(),
  next_page_disabled_check: z.string().optional(),
  iframe: z.string().optional(),
  job_table: z.string().optional(),
  job_button: z.string().optional(),
  back_button: z.string().optional(),
  view_all_button: z.string().optional(),
  cookie_modal_class: z.string().optional(),
}).passthrough();

export type Selectors = z.infer<typeof SelectorsSchema>;

export const SettingsSchema = z.object({
  max_pages: z.number().int().positive().optional(),
  min_new_jobs_per_page: z.number().int().nonnegative().optional(),
  early_stop: z.boolean().optional(),
  sleep_between_jobs: z.number().nonnegative().optional(),
  start_page: z.number().int().nonnegative().optional(),
  url_pattern: z.string().optional(),
  base_url: z.string().optional(),
  handle_cookies: z.boolean().optional(),
  wait_between_pages_min: z.number().nonnegative().optional(),
  wait_between_pages_max: z.number().nonnegative().optional(),
  max_consecutive_errors: z.number().int().positive().optional(),
  click_back_after_job: z.boolean().optional(),
  click_view_all_after_back: z.boolean().optional(),
  frame_settle_ms: z.number().int().nonnegative().optional(),
}).passthrough();

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Source names prefix cache file names, so they must stay inside one directory.
 */
export function isFlatFileName(name: string): boolean {
  return !/[\\/]/.test(name) && !name.includes('..');
}

export const SiteEntrySchema = z.object({
  name: z.string().min(1).refine(isFlatFileName, 'must not contain path separators or ".."'),
  url: z.string().url(),
  enabled: z.boolean().default(true),
  selectors: SelectorsSchema.optional(),
  settings: SettingsSchema.optional(),
});

export type SiteEntry = z.infer<typeof SiteEntrySchema>;

export const JobBoardGroupSchema = z.object({
  group: z.string().min(1),
  type: BackendTypeSchema,
  enabled: z.boolean().default(true),
  selectors: SelectorsSchema.default({}),
  settings: SettingsSchema.default({}),
  sites: z.array(SiteEntrySchema).default([]),
});

export type JobBoardGroup = z.infer<typeof JobBoardGroupSchema>;

/**
 * One configured crawl target. Frozen once built; strategies read it, never write it.
 */
export interface SourceDescriptor {
  readonly name: string;
  readonly url: string;
  readonly group: string;
  readonly backendType: BackendType;
  readonly selectors: Readonly<Selectors>;
  readonly settings: Readonly<Settings>;
  readonly enabled: boolean;
}
