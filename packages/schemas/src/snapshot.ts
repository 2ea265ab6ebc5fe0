import { z } from 'zod';
import { pageKindEnum } from './enums';
import { syncRecordSchema } from './records';

export const SNAPSHOT_VERSION = 1;

/** Self-describing artifact written per completed entity unit; replayable without re-fetching. */
export const entitySnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  unitKey: z.string(),
  pageKind: pageKindEnum,
  externalId: z.number().int().positive(),
  url: z.string(),
  capturedAt: z.string(),
  records: z.array(syncRecordSchema),
  extras: z.record(z.unknown()).default({}),
});
export type EntitySnapshot = z.infer<typeof entitySnapshotSchema>;
