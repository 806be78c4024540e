export {
  ParamsValidator,
  getDefaultParamsValidator,
  commaSeparatedValidator,
  partsValidator,
  incompatibleValidator,
  enfCommaSeparated,
  enfParts,
  fieldValueSchema,
} from "./utils/validation.js";
export type { FieldValue } from "./utils/validation.js";
export {
  ErrorCode,
  YouTubeParamsError,
  invalidParams,
  missingParams,
  isYouTubeParamsError,
} from "./youtube/errors.js";
export {
  RESOURCE_PARTS,
  createResourcePartsMapping,
  loadResourceParts,
  resourcePartsSchema,
} from "./youtube/resource-parts.js";
export type {
  ResourcePartsMapping,
  ResourcePartsRecord,
} from "./youtube/resource-parts.js";
export { logger } from "./utils/logger.js";
