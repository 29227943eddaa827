import path from "node:path";
import type { ReelsortConfig } from "../config/schema.js";
import type { OnTransferProgress, TransferOutcome } from "../transfer/types.js";
import type { FilmAttributes } from "./types.js";
import {
  resolveDestinationTemplate,
  resolveTitleOptions,
  resolveTransferOptions,
} from "../config/io.js";
import { createSubsystemLogger } from "../logging/logger.js";
import { safeMove } from "../transfer/move.js";
import { parseFilm } from "./parse.js";
import { resolveDestinationPath } from "./template-context.js";

const log = createSubsystemLogger("organize");

export type OrganizeParams = {
  source_path: string;
  dest_root: string;
  allow_upgrade?: boolean;
};

export type OrganizeResult = {
  film: FilmAttributes;
  destination: string;
  outcome: TransferOutcome;
};

/**
 * Parse a film file's name, format its destination under `dest_root` and
 * move it there. Throws SourceNotFoundError when the source is missing.
 */
export async function organizeFile(
  params: OrganizeParams,
  config: ReelsortConfig = {},
  onProgress?: OnTransferProgress,
): Promise<OrganizeResult> {
  const film = parseFilm(params.source_path, resolveTitleOptions(config));
  if (!film.title) {
    log.warn({ source: params.source_path }, "could not determine a title");
  }

  const destination = resolveDestinationPath({
    root: params.dest_root,
    template: resolveDestinationTemplate(config),
    film,
    ext: path.extname(params.source_path),
  });
  log.debug({ source: params.source_path, destination, film }, "resolved destination");

  const outcome = await safeMove(
    {
      source: params.source_path,
      destination,
      allow_upgrade: params.allow_upgrade ?? false,
    },
    { ...resolveTransferOptions(config), onProgress },
  );

  return { film, destination, outcome };
}
