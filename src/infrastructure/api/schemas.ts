import { z } from 'zod';

/** Event types the export service can emit. */
export const EVENT_TYPES = ['heart_rate', 'spo2', 'bp_sys', 'bp_dia'] as const;
export type EventType = (typeof EVENT_TYPES)[number];

/** Every JSON response of the export service is wrapped in `{ data }`. */
export function apiResponse<T extends z.ZodTypeAny>(data: T) {
  return z.object({ data });
}

export const exportListSchema = apiResponse(
  z.object({
    export_ids: z.array(z.string().min(1)),
  }),
);

export const exportDetailSchema = apiResponse(
  z.object({
    id: z.string().min(1),
    download_ids: z.array(z.string().uuid()),
  }),
);

export const downloadDetailSchema = apiResponse(
  z.object({
    id: z.string().uuid(),
    rows: z.number().int().nonnegative(),
    event_types: z.array(z.enum(EVENT_TYPES)),
    patients: z.array(z.string().min(1)),
    start_time: z.string().datetime(),
    end_time: z.string().datetime(),
  }),
);

