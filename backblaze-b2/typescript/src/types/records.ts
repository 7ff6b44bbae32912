/**
 * Wire records returned by the B2 native API
 * @module backblaze-b2/types/records
 */

import { z } from 'zod';

/**
 * b2_authorize_account response.
 */
export const authorizeAccountSchema = z.object({
  accountId: z.string().min(1),
  apiUrl: z.string().url(),
  downloadUrl: z.string().url(),
  authorizationToken: z.string().min(1),
});

export type AuthorizeAccountRecord = z.infer<typeof authorizeAccountSchema>;

export const bucketRecordSchema = z.object({
  bucketId: z.string(),
  bucketName: z.string(),
  bucketType: z.string(),
  accountId: z.string().optional(),
});

export type BucketRecord = z.infer<typeof bucketRecordSchema>;

export const listBucketsSchema = z.object({
  buckets: z.array(bucketRecordSchema),
});

export const fileRecordSchema = z.object({
  fileId: z.string(),
  fileName: z.string(),
  size: z.number().optional(),
  contentLength: z.number().optional(),
  contentSha1: z.string().nullable().optional(),
  contentType: z.string().nullable().optional(),
  fileInfo: z.record(z.string()).optional(),
  uploadTimestamp: z.number().optional(),
  action: z.string().optional(),
});

export type FileRecord = z.infer<typeof fileRecordSchema>;

/**
 * b2_list_file_names and b2_list_file_versions responses.
 */
export const listFilesSchema = z.object({
  files: z.array(fileRecordSchema),
  nextFileName: z.string().nullable().optional(),
  nextFileId: z.string().nullable().optional(),
});

export type ListFilesRecord = z.infer<typeof listFilesSchema>;

/**
 * b2_get_upload_url response.
 */
export const uploadUrlSchema = z.object({
  bucketId: z.string(),
  uploadUrl: z.string().url(),
  authorizationToken: z.string().min(1),
});
