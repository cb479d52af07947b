// Mix route: three uploaded clips + knobs in, one normalized MP3 out
import { createReadStream } from "node:fs";
import type { FastifyPluginAsync } from "fastify";
import type { AssetRole, KnobSource } from "@voicebed/contracts";
import { InvalidInputError } from "../lib/errors.js";
import {
  resolveMixRequest,
  storeAsset,
  type AudioAsset,
  type MixPipeline,
} from "../mix/index.js";

export type MixRunner = Pick<MixPipeline, "allocate" | "run" | "discard">;

export interface MixRoutesOptions {
  pipeline: MixRunner;
  minAssetBytes: number;
}

// Multipart file field -> asset role
const FILE_FIELDS: Record<string, AssetRole> = {
  intro: "intro",
  narr: "narration",
  outro: "outro",
};

const mixRoutes: FastifyPluginAsync<MixRoutesOptions> = async (app, opts) => {
  const { pipeline, minAssetBytes } = opts;

  /**
   * Mix intro bed + narration + outro bed.
   * Knobs come from the query string first, then from form fields.
   */
  app.post<{ Querystring: KnobSource }>("/api/mix", async (request, reply) => {
    if (!request.isMultipart()) {
      throw new InvalidInputError("Expected multipart/form-data with intro, narr and outro files", "request");
    }

    const workspace = await pipeline.allocate();
    const uploaded: Partial<Record<AssetRole, AudioAsset>> = {};
    const formFields: KnobSource = {};

    try {
      for await (const part of request.parts()) {
        if (part.type === "field") {
          formFields[part.fieldname] = part.value;
          continue;
        }

        const role = FILE_FIELDS[part.fieldname];
        if (!role) {
          part.file.resume();
          continue;
        }

        // Size is gated by the pipeline, only for the clips the run reads
        const bytes = await part.toBuffer();
        uploaded[role] = await storeAsset(role, bytes, workspace.dir, `${role}.upload`, minAssetBytes);
      }

      const { intro, narration, outro } = uploaded;
      if (!intro || !narration || !outro) {
        const missing = Object.keys(FILE_FIELDS).filter((field) => !uploaded[FILE_FIELDS[field]]);
        throw new InvalidInputError(`Missing file parts: ${missing.join(", ")}`, "request");
      }

      const mixRequest = resolveMixRequest(request.query, formFields);
      const run = await pipeline.run({
        assets: { intro, narration, outro },
        request: mixRequest,
        workspace,
      });

      reply.raw.once("close", () => {
        pipeline.discard(run).catch((err: unknown) => {
          request.log.warn({ err, runId: run.runId }, "Failed to discard run directory");
        });
      });

      return reply
        .header("Content-Type", "audio/mpeg")
        .header("Content-Disposition", 'attachment; filename="final_mix.mp3"')
        .header("X-Mix-Run-Id", run.runId)
        .header("X-Mix-Status", run.status.kind === "succeeded-early" ? run.status.reason : run.status.kind)
        .send(createReadStream(run.output.path));
    } catch (error) {
      await pipeline.discard({ workspace });
      throw error;
    }
  });
};

export default mixRoutes;
