export type DuplicateDecision = "replace" | "keep";

export type DuplicateParams = {
  sourceBytes: number;
  destinationBytes: number;
  forceOverwrite: boolean;
  allowUpgrade: boolean;
};

/**
 * Decide whether an existing destination may be replaced by the source.
 *
 * Size stands in for quality: a larger source replaces a smaller
 * destination. A smaller source only wins when the caller has already
 * established it is an upgrade (e.g. a better encode at a lower bitrate).
 * Equal sizes are never replaced without force-overwrite.
 */
export function decideDuplicate(params: DuplicateParams): DuplicateDecision {
  const { sourceBytes, destinationBytes, forceOverwrite, allowUpgrade } = params;
  if (forceOverwrite) {
    return "replace";
  }
  if (allowUpgrade && sourceBytes < destinationBytes) {
    return "replace";
  }
  if (sourceBytes > destinationBytes) {
    return "replace";
  }
  return "keep";
}
