import { existsSync } from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { TransferProgressEvent } from "../transfer/types.js";
import { SourceNotFoundError } from "../transfer/errors.js";
import { organizeFile } from "./organize.js";

const RELEASE = "Heat.1995.1080p.BluRay.x264-GRP";

describe("organizeFile", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "reelsort-organize-test-"));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function makeSource(caseName: string): Promise<{ source: string; destRoot: string }> {
    const source = path.join(tmpDir, caseName, "incoming", RELEASE, `${RELEASE}.MKV`);
    await fs.mkdir(path.dirname(source), { recursive: true });
    await fs.writeFile(source, "heat-bytes");
    return { source, destRoot: path.join(tmpDir, caseName, "library") };
  }

  it("parses, formats and moves a film into the library", async () => {
    const { source, destRoot } = await makeSource("move");
    const events: TransferProgressEvent[] = [];

    const result = await organizeFile({ source_path: source, dest_root: destRoot }, {}, (e) =>
      events.push(e),
    );

    const expected = path.join(destRoot, "Heat (1995)", "Heat (1995) Bluray-1080p.mkv");
    expect(result.film).toMatchObject({
      title: "Heat",
      year: 1995,
      resolution: "1080p",
      media: "bluray",
      edition: null,
      part: null,
      is_hdr: false,
      is_proper: false,
    });
    expect(result.destination).toBe(expected);
    expect(result.outcome.ok).toBe(true);
    expect(result.outcome.action).toBe("direct_move");
    expect(await fs.readFile(expected, "utf-8")).toBe("heat-bytes");
    expect(existsSync(source)).toBe(false);
    expect(events.map((e) => e.type)).toEqual(["transfer.start", "transfer.done"]);
  });

  it("leaves everything in place when test mode is on", async () => {
    const { source, destRoot } = await makeSource("dry-run");

    const result = await organizeFile({ source_path: source, dest_root: destRoot }, { test: true });

    expect(result.outcome.dry_run).toBe(true);
    expect(result.outcome.ok).toBe(true);
    expect(existsSync(source)).toBe(true);
    expect(existsSync(destRoot)).toBe(false);
  });

  it("uses a configured destination template", async () => {
    const { source, destRoot } = await makeSource("template");

    const result = await organizeFile(
      { source_path: source, dest_root: destRoot },
      { destination_template: "{YEAR}/{TITLE_SORT} [{RESOLUTION}]", safe_copy: true },
    );

    expect(result.destination).toBe(path.join(destRoot, "1995", "Heat [1080p].mkv"));
    expect(result.outcome.action).toBe("staged_copy");
    expect(await fs.readFile(result.destination, "utf-8")).toBe("heat-bytes");
  });

  it("throws SourceNotFoundError for a missing source", async () => {
    await expect(
      organizeFile({
        source_path: path.join(tmpDir, "missing", `${RELEASE}.mkv`),
        dest_root: path.join(tmpDir, "missing", "library"),
      }),
    ).rejects.toBeInstanceOf(SourceNotFoundError);
  });
});
