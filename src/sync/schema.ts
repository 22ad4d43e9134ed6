/**
 * Validation schema for the persisted sync config (.mdsync.json).
 * Unknown keys pass through so files written by newer versions still load.
 */
import { z } from 'zod';
import { hasZoneDesignator } from './timestamps.js';

const timestampSchema = z.string()
  .refine(hasZoneDesignator, {
    message: 'timestamp must be ISO 8601 with a timezone designator (e.g. 2025-01-01T00:00:00.000Z)',
  })
  .refine(value => !Number.isNaN(Date.parse(value)), {
    message: 'timestamp is not a valid date',
  });

export const remoteDescriptorSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('filesystem'),
    path: z.string().min(1),
  }).passthrough(),
  z.object({
    type: z.literal('drive'),
    folderId: z.string().min(1),
    folderName: z.string(),
  }).passthrough(),
]);

export const syncRecordSchema = z.object({
  remoteLocation: z.string(),
  lastUploadAt: timestampSchema.optional(),
  localModTimeAtLastUpload: timestampSchema.optional(),
}).passthrough();

export const syncConfigSchema = z.object({
  version: z.literal(1).default(1),
  localPath: z.string().min(1),
  remote: remoteDescriptorSchema,
  lastSyncAt: timestampSchema.nullable().default(null),
  ignore: z.array(z.string()).default([]),
  files: z.record(z.string(), syncRecordSchema).default({}),
}).passthrough();

/**
 * Render zod issues as "files.a.md.lastUploadAt: message; ..." for error output.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
