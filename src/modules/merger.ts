/**
 * Merger Module
 * Copies the preprocessed lights of every session into the output directory
 * under one global, contiguous sequence and records the conversion manifest
 */

import { copyFile, readdir } from "fs/promises";
import path from "node:path";
import {
  ConversionManifest,
  assertUniqueSessions,
  createSequenceMatcher,
  resolvePath,
  sequenceFileName,
} from "../utils";
import type {
  MergeResult,
  PipelineContext,
  SessionMergeCount,
} from "../types";

export interface MergeSessionsOptions {
  sessionPaths: string[];
  outputPath: string;
  processDir: string;
  seqName: string;
  /**
   * Sort matched names within each session. Off by default: files are taken
   * in the order the filesystem lists them, which is not stable across
   * platforms, so callers that need reproducible numbering should enable it.
   */
  sort?: boolean;
  onSessionMerged?: (count: SessionMergeCount) => void;
}

/**
 * Merge the process directories of all sessions into `outputPath`
 *
 * The sequence index starts at 1 and is shared by every session, so session N
 * continues where session N-1 stopped. A session with no matching files adds
 * nothing. A session listed twice is rejected before anything is copied.
 * A missing process directory rejects with the listing error; files already
 * copied stay where they are.
 */
export async function mergeSessions(
  options: MergeSessionsOptions,
): Promise<MergeResult> {
  const { processDir, seqName, sort = false, onSessionMerged } = options;
  const outputPath = resolvePath(options.outputPath);
  const matcher = createSequenceMatcher(seqName);

  const manifest = new ConversionManifest();
  const sessions: SessionMergeCount[] = [];
  let seqIndex = 1;

  const sessionPaths = options.sessionPaths.map((p) => resolvePath(p));
  assertUniqueSessions(sessionPaths);

  for (const sessionPath of sessionPaths) {
    const sessionProcessPath = path.join(sessionPath, processDir);

    const names = (await readdir(sessionProcessPath)).filter((name) =>
      matcher.test(name),
    );
    if (sort) {
      names.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    }

    for (const name of names) {
      const source = path.join(sessionProcessPath, name);
      const destination = path.join(
        outputPath,
        sequenceFileName(seqName, seqIndex),
      );

      await copyFile(source, destination);
      manifest.add(source, destination);
      seqIndex++;
    }

    const count = { sessionPath, files: names.length };
    sessions.push(count);
    onSessionMerged?.(count);
  }

  const manifestPath = await manifest.save(outputPath);

  return { manifest, manifestPath, sessions };
}

/**
 * Pipeline step: merge every session of the context
 * Works on absolute paths only, so no Siril directory scope is needed
 */
export async function merge(ctx: PipelineContext): Promise<void> {
  const result = await mergeSessions({
    sessionPaths: ctx.sessionPaths,
    outputPath: ctx.outputPath,
    processDir: ctx.processDir,
    seqName: ctx.seqName,
    sort: ctx.sort,
    onSessionMerged: ({ sessionPath, files }) =>
      ctx.logger.debug(`Merged ${files} file(s) from ${sessionPath}`),
  });

  ctx.tracker.setMerged(result.sessions);
  ctx.logger.debug(`Wrote manifest with ${result.manifest.size} entries to ${result.manifestPath}`);
  ctx.merge = result;
}
