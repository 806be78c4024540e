import { z } from "zod";

/**
 * Shape of the resource → parts table: every resource kind lists at least
 * one part, and no part name is empty.
 */
export const resourcePartsSchema = z.record(
  z.string().min(1),
  z.array(z.string().min(1)).nonempty(),
);

export type ResourcePartsRecord = z.infer<typeof resourcePartsSchema>;

export type ResourcePartsMapping = ReadonlyMap<string, ReadonlySet<string>>;

/**
 * YouTube Data API v3 resource kinds and the `part` values each accepts.
 */
export const RESOURCE_PARTS = {
  activity: ["id", "contentDetails", "snippet"],
  caption: ["id", "snippet"],
  channel: [
    "id",
    "auditDetails",
    "brandingSettings",
    "contentDetails",
    "contentOwnerDetails",
    "localizations",
    "snippet",
    "statistics",
    "status",
    "topicDetails",
  ],
  channelSection: ["id", "contentDetails", "snippet", "targeting"],
  comment: ["id", "snippet"],
  commentThread: ["id", "replies", "snippet"],
  guideCategory: ["id", "snippet"],
  i18nLanguage: ["id", "snippet"],
  i18nRegion: ["id", "snippet"],
  member: ["snippet"],
  membershipsLevel: ["id", "snippet"],
  playlist: ["id", "contentDetails", "localizations", "player", "snippet", "status"],
  playlistItem: ["id", "contentDetails", "snippet", "status"],
  search: ["id", "snippet"],
  subscription: ["id", "contentDetails", "snippet", "subscriberSnippet"],
  video: [
    "id",
    "contentDetails",
    "fileDetails",
    "liveStreamingDetails",
    "localizations",
    "player",
    "processingDetails",
    "recordingDetails",
    "snippet",
    "statistics",
    "status",
    "suggestions",
    "topicDetails",
  ],
  videoAbuseReportReason: ["id", "snippet"],
  videoCategory: ["id", "snippet"],
} satisfies ResourcePartsRecord;

/**
 * Build the read-only lookup used by the validator. Part order follows the
 * record, which is the order `enfParts` emits defaults in.
 */
export function createResourcePartsMapping(
  record: ResourcePartsRecord,
): ResourcePartsMapping {
  const mapping = new Map<string, ReadonlySet<string>>();
  for (const [resource, parts] of Object.entries(record)) {
    mapping.set(resource, new Set(parts));
  }
  return mapping;
}

/**
 * Validate an untyped parts table (parsed JSON, user config) and build the
 * lookup from it. Throws a `ZodError` when the table is malformed.
 */
export function loadResourceParts(table: unknown): ResourcePartsMapping {
  return createResourcePartsMapping(resourcePartsSchema.parse(table));
}
