/**
 * Response body schemas for the HubSpot companies endpoints.
 */

import { z } from 'zod';

export const companyRecordSchema = z.object({
  id: z.string(),
  properties: z.record(z.string().nullable().optional()),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
  archived: z.boolean().optional(),
});

export const companyCollectionSchema = z.object({
  results: z.array(companyRecordSchema).default([]),
});
