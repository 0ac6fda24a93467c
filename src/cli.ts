#!/usr/bin/env node
// flac-relay CLI
//
// Server:
//   flac-relay serve --port 8080 --catalog-url https://catalog.example --catalog-user relay \
//     --catalog-password test-secret --store-url https://store.example
//   every option falls back to PORT, HOST, CATALOG_URL, CATALOG_USER,
//   CATALOG_PASSWORD, STORE_URL
//
// Local files:
//   flac-relay rewrite --src in.flac --out out.flac --tag TITLE=Song --tag ARTIST=Band
//   flac-relay inspect --src in.flac

import { array, command, multioption, number, option, run, string, subcommands } from "cmd-ts";
import { promises as fs, createWriteStream } from "node:fs";
import { LoggerImpl } from "@adviser/cement";
import { blockBody, blockType, type MetadataBlock } from "./container/blocks.js";
import { readMetadata } from "./container/inspect.js";
import { rewriteContainer } from "./container/walker.js";
import { blockTypeName } from "./block-header.js";
import { parseRelayConfig, parseServerConfig } from "./config.js";
import { TrackRelay } from "./relay.js";
import { createRelayServer, writableSink } from "./server.js";
import { createRewritePlan, parseTagAssignment } from "./tags/rewrite-plan.js";
import { tagBlockEntries } from "./tags/vorbis-comment.js";

// ── file helpers ──────────────────────────────────────────────────────────────

async function fileSource(path: string, chunkSize = 64 * 1024): Promise<ReadableStream<Uint8Array>> {
  const fh = await fs.open(path, "r");
  return new ReadableStream<Uint8Array>({
    async pull(ctrl): Promise<void> {
      const buf = new Uint8Array(chunkSize);
      const { bytesRead } = await fh.read(buf, 0, chunkSize, null);
      if (bytesRead === 0) {
        await fh.close();
        ctrl.close();
        return;
      }
      ctrl.enqueue(buf.subarray(0, bytesRead));
    },
    async cancel(): Promise<void> {
      await fh.close();
    },
  });
}

function describeBlock(block: MetadataBlock): Record<string, unknown> {
  const type = blockType(block);
  return {
    type: blockTypeName(type),
    code: type,
    lastBlock: block.lastBlock,
    length: blockBody(block).byteLength,
    ...(block.kind === "tags" ? { vendor: block.tags.vendor, tags: tagBlockEntries(block.tags) } : {}),
  };
}

// ── serve command ─────────────────────────────────────────────────────────────

const serveCmd = command({
  name: "serve",
  description: "Serve /track/{uuid}.flac with catalog tags rewritten in-stream",
  args: {
    port: option({
      type: number,
      long: "port",
      short: "p",
      description: "Listen port (env PORT, default 8080)",
      defaultValue: () => Number(process.env.PORT ?? 8080),
    }),
    host: option({
      type: string,
      long: "host",
      description: "Listen address (env HOST, default all interfaces)",
      defaultValue: () => process.env.HOST ?? "",
    }),
    catalogUrl: option({
      type: string,
      long: "catalog-url",
      description: "Catalog service base URL (env CATALOG_URL)",
      defaultValue: () => process.env.CATALOG_URL ?? "",
    }),
    catalogUser: option({
      type: string,
      long: "catalog-user",
      description: "Catalog username (env CATALOG_USER)",
      defaultValue: () => process.env.CATALOG_USER ?? "",
    }),
    catalogPassword: option({
      type: string,
      long: "catalog-password",
      description: "Catalog password (env CATALOG_PASSWORD)",
      defaultValue: () => process.env.CATALOG_PASSWORD ?? "",
    }),
    storeUrl: option({
      type: string,
      long: "store-url",
      description: "Object store base URL (env STORE_URL)",
      defaultValue: () => process.env.STORE_URL ?? "",
    }),
  },
  handler: async ({ port, host, catalogUrl, catalogUser, catalogPassword, storeUrl }): Promise<void> => {
    const config = parseRelayConfig({
      catalog: { url: catalogUrl, username: catalogUser, password: catalogPassword },
      store: { url: storeUrl },
    });
    const serverConfig = parseServerConfig({ port, ...(host ? { host } : {}) });

    const logger = new LoggerImpl();
    const relay = new TrackRelay(config, { logger });
    const server = createRelayServer(relay, logger);
    const log = logger.With().Module("cli").Logger();

    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(serverConfig.port, serverConfig.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    log.Info().Uint64("port", serverConfig.port).Str("host", serverConfig.host ?? "*").Msg("listening");

    const shutdown = (): void => {
      log.Info().Msg("shutting down");
      server.close();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  },
});

// ── rewrite command ───────────────────────────────────────────────────────────

const rewriteCmd = command({
  name: "rewrite",
  description: "Rewrite the tags of a local .flac file through the streaming rewriter",
  args: {
    src: option({ type: string, long: "src", short: "s", description: "Input .flac file" }),
    out: option({ type: string, long: "out", short: "o", description: "Output .flac file" }),
    tags: multioption({
      type: array(string),
      long: "tag",
      short: "t",
      description: "KEY=VALUE to overwrite (repeatable)",
    }),
  },
  handler: async ({ src, out, tags }): Promise<void> => {
    if (src === out) throw new Error("--src and --out must differ");
    const plan = createRewritePlan(tags.map(parseTagAssignment));
    const rewritten = rewriteContainer(await fileSource(src), plan, {
      onBlock: ({ header, action, delta }) => {
        console.error(`[rewrite] ${blockTypeName(header.type)} ${action} length=${header.length} delta=${delta}`);
      },
    });
    await rewritten.pipeTo(writableSink(createWriteStream(out)));
    console.error(`[rewrite] ${src} → ${out} (${plan.length} tags)`);
  },
});

// ── inspect command ───────────────────────────────────────────────────────────

const inspectCmd = command({
  name: "inspect",
  description: "Print the metadata blocks and tags of a .flac file as JSON",
  args: {
    src: option({ type: string, long: "src", short: "s", description: "Input .flac file" }),
  },
  handler: async ({ src }): Promise<void> => {
    const meta = await readMetadata(await fileSource(src));
    console.log(
      JSON.stringify({ headerRegionLength: meta.headerRegionLength, blocks: meta.blocks.map(describeBlock) }, null, 2),
    );
  },
});

// ── main ──────────────────────────────────────────────────────────────────────

const app = subcommands({
  name: "flac-relay",
  description: "Stream FLAC tracks with catalog tags rewritten on the fly",
  cmds: { serve: serveCmd, rewrite: rewriteCmd, inspect: inspectCmd },
});

run(app, process.argv.slice(2)).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
