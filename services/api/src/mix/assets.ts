// Input assets and the minimum-size gate
import { stat, writeFile } from "node:fs/promises";
import path from "node:path";
import type { AssetRole } from "@voicebed/contracts";
import { InvalidInputError } from "../lib/errors.js";

/** Anything under this many bytes is certainly not usable audio */
export const MIN_ASSET_BYTES = 500;

export interface AudioAsset {
  readonly role: AssetRole;
  readonly path: string;
  readonly byteLength: number;
  /** byteLength reaches the minimum plausible size */
  readonly valid: boolean;
}

export type AssetSet = Record<AssetRole, AudioAsset>;

/**
 * Byte length of a file, or null when it does not exist or is not a file
 */
export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const info = await stat(filePath);
    return info.isFile() ? info.size : null;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Describe an existing file as an asset
 */
export async function describeAsset(
  role: AssetRole,
  filePath: string,
  minBytes: number = MIN_ASSET_BYTES
): Promise<AudioAsset> {
  const size = await fileSize(filePath);
  if (size === null) {
    throw new InvalidInputError(`Missing ${role} file: ${path.basename(filePath)}`, role);
  }

  return { role, path: filePath, byteLength: size, valid: size >= minBytes };
}

/**
 * Persist raw audio bytes (an upload or a TTS response) as an asset.
 * Rejects payloads under the minimum size without writing them.
 */
export async function assetFromBytes(
  role: AssetRole,
  bytes: Uint8Array,
  dir: string,
  fileName: string,
  minBytes: number = MIN_ASSET_BYTES
): Promise<AudioAsset> {
  if (bytes.byteLength < minBytes) {
    throw new InvalidInputError(
      `${role} audio is ${bytes.byteLength} bytes; at least ${minBytes} required`,
      role
    );
  }

  const filePath = path.join(dir, fileName);
  await writeFile(filePath, bytes);

  return { role, path: filePath, byteLength: bytes.byteLength, valid: true };
}

/**
 * Persist raw audio bytes without gating them. The validity flag is left for
 * the pipeline, which only checks the assets a run reads.
 */
export async function storeAsset(
  role: AssetRole,
  bytes: Uint8Array,
  dir: string,
  fileName: string,
  minBytes: number = MIN_ASSET_BYTES
): Promise<AudioAsset> {
  const filePath = path.join(dir, fileName);
  await writeFile(filePath, bytes);

  return { role, path: filePath, byteLength: bytes.byteLength, valid: bytes.byteLength >= minBytes };
}

/**
 * Reject an asset that is flagged invalid
 */
export function requireValidAsset(asset: AudioAsset, minBytes: number = MIN_ASSET_BYTES): void {
  if (!asset.valid || asset.byteLength < minBytes) {
    throw new InvalidInputError(
      `${asset.role} audio is ${asset.byteLength} bytes; at least ${minBytes} required`,
      asset.role
    );
  }
}

/**
 * Contract of a text-to-speech provider that supplies narration audio
 */
export interface NarrationProvider {
  synthesize(script: string, voiceId: string): Promise<Uint8Array>;
}

/**
 * Obtain narration from a TTS provider and gate it like any other asset
 */
export async function narrationFromProvider(
  provider: NarrationProvider,
  script: string,
  voiceId: string,
  dir: string,
  minBytes: number = MIN_ASSET_BYTES
): Promise<AudioAsset> {
  const bytes = await provider.synthesize(script, voiceId);
  return assetFromBytes("narration", bytes, dir, "narration.mp3", minBytes);
}
