import path from "node:path";

export type SourcePathParts = {
  folder: string; // name of the containing folder, "" when there is none
  file: string;
  joined: string; // `${folder}/${file}`, the string most patterns run against
};

export function splitSourcePath(sourcePath: string): SourcePathParts {
  const file = path.basename(sourcePath);
  const dir = path.dirname(sourcePath);
  const folder = dir === "." || dir === sourcePath ? "" : path.basename(dir);
  return { folder, file, joined: `${folder}/${file}` };
}
