/**
 * Wire schemas for the remote library service
 *
 * Responses are validated before they reach the rest of the service.
 * Missing scalar fields fall back to zero values; a wrong type is a
 * contract violation.
 */

import { z } from 'zod';

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const count = z
  .number()
  .int()
  .nullish()
  .transform((value) => value ?? 0);

const idList = z
  .array(z.number().int())
  .nullish()
  .transform((value) => value ?? []);

export const bookdropFileSchema = z.object({
  id: z.number().int(),
  fileName: text,
  filePath: text,
  fileSize: count,
  status: text,
  dateAdded: text,
  dateScanned: text,
});

export const bookdropPageSchema = z.object({
  content: z
    .array(bookdropFileSchema)
    .nullish()
    .transform((value) => value ?? []),
  totalElements: count,
  totalPages: count,
  size: count,
  number: count,
  first: z.boolean().default(true),
  last: z.boolean().default(true),
});

export const importOutcomeSchema = z.object({
  success: z.boolean().default(false),
  importedCount: count,
  failedCount: count,
  importedIds: idList,
  failedIds: idList,
  message: text,
});

export const notificationSummarySchema = z.object({
  totalFiles: count,
  newFiles: count,
  processedFiles: count,
  importedFiles: count,
  failedFiles: count,
});

export const librarySchema = z.object({
  id: z.number().int(),
  name: text,
  paths: z
    .array(z.object({ id: z.number().int(), path: text }))
    .nullish()
    .transform((value) => value ?? []),
});

export const libraryListSchema = z.array(librarySchema);

/**
 * Structured error body; only counts as structured with a message
 */
export const remoteErrorBodySchema = z.object({
  message: z.string().min(1),
  status: z.number().int().optional(),
  path: z.string().optional(),
  timestamp: z.string().optional(),
  error: z.string().optional(),
});
