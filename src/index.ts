export type {
  EditionAliasTable,
  EditionMatch,
  FilmAttributes,
  Media,
  Resolution,
  TitleOptions,
} from "./film/types.js";
export * as patterns from "./film/patterns.js";
export { DEFAULT_EDITION_MAP, resolveEdition, validateEditionMap } from "./film/edition.js";
export {
  DEFAULT_TITLE_OPTIONS,
  extractEdition,
  extractMedia,
  extractPart,
  extractResolution,
  extractTitle,
  extractYear,
  isHdr,
  isProper,
  parseFilm,
  TITLE_STEPS,
  type TitleContext,
  type TitleStep,
} from "./film/parse.js";
export {
  ALLOWED_TOKENS,
  DEFAULT_DESTINATION_TEMPLATE,
  expandTemplate,
  validatePattern,
  type TokenContext,
} from "./film/template-expand.js";
export { buildTokenContext, resolveDestinationPath, toSortTitle } from "./film/template-context.js";
export { organizeFile, type OrganizeParams, type OrganizeResult } from "./film/organize.js";

export type {
  DestinationState,
  HashAlgo,
  OnTransferProgress,
  SourceState,
  TransferAction,
  TransferOptions,
  TransferOutcome,
  TransferProgressEvent,
  TransferRequest,
  VerifyMode,
} from "./transfer/types.js";
export { DEFAULT_TRANSFER_OPTIONS, safeMove } from "./transfer/move.js";
export { PARTIAL_SUFFIX, stagingPath } from "./transfer/copy.js";
export { decideDuplicate, type DuplicateDecision } from "./transfer/duplicates.js";
export { SourceNotFoundError } from "./transfer/errors.js";

export {
  ConfigValidationError,
  createConfigIO,
  resolveDestinationTemplate,
  resolveTitleOptions,
  resolveTransferOptions,
  validateConfig,
  type ConfigIO,
} from "./config/io.js";
export { resolveConfigPath, resolveStateDir } from "./config/paths.js";
export { ReelsortConfigSchema, type ReelsortConfig } from "./config/schema.js";
export { createSubsystemLogger } from "./logging/logger.js";
