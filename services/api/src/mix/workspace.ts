// Per-run scratch directories
import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
import { nanoid } from "nanoid";

export interface Workspace {
  runId: string;
  dir: string;
}

/**
 * Generate a run identifier
 */
export function generateRunId(): string {
  return `mix_${nanoid(16)}`;
}

/**
 * Create a uniquely named scratch directory under `root`.
 * mkdir without `recursive` fails on an existing path, so two runs never share one.
 */
export async function allocateWorkspace(root: string, runId: string = generateRunId()): Promise<Workspace> {
  await mkdir(root, { recursive: true });
  const dir = path.join(root, runId);
  await mkdir(dir);
  return { runId, dir };
}

/**
 * Remove a scratch directory and everything in it
 */
export async function releaseWorkspace(workspace: Workspace): Promise<void> {
  await rm(workspace.dir, { recursive: true, force: true });
}
