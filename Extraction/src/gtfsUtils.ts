import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { pipeline } from "node:stream/promises";
import fetch from "node-fetch";
import StreamZip from "node-stream-zip";
import pRetry, { AbortError } from "p-retry";

import type { Config } from "./config.js";
import type { Logger } from "./logger.js";

export const STOPS_ENTRY = "stops.txt";

export async function download(url: string, dest: string, logger: Logger = console) {
    await pRetry(
        async () => {
            const res = await fetch(url);
            // no retry on 4xx
            if (res.status >= 400 && res.status < 500) throw new AbortError(`download failed ${res.status}`);
            if (!res.ok || !res.body) throw new Error(`download failed ${res.status}`);
            await pipeline(res.body, fs.createWriteStream(dest));
        },
        {
            retries: 2,
            onFailedAttempt: err => {
                logger.error(`download attempt ${err.attemptNumber} failed: ${err.message}`);
            },
        }
    );
}

/**
 * Stop file to read. When it does not exist and a feed URL is configured,
 * the zip is fetched once into the output directory and reused afterwards.
 */
export async function resolveStopsFile(cfg: Config, logger: Logger = console): Promise<string> {
    if (fs.existsSync(cfg.stopsFile)) return cfg.stopsFile;
    if (!cfg.gtfsUrl) throw new Error(`stop file not found: ${cfg.stopsFile}`);

    fs.mkdirSync(cfg.outDir, { recursive: true });
    const zipFile = path.join(cfg.outDir, "gtfs.zip");
    if (!fs.existsSync(zipFile)) {
        logger.log(`downloading GTFS feed from ${cfg.gtfsUrl}…`);
        await download(cfg.gtfsUrl, zipFile, logger);
    } else {
        logger.log(`using cached ${zipFile}`);
    }
    return zipFile;
}

export function isZip(file: string): boolean {
    return path.extname(file).toLowerCase() === ".zip";
}

async function* linesOf(stream: NodeJS.ReadableStream): AsyncGenerator<string> {
    const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
    try {
        for await (const line of rl) yield line;
    } finally {
        rl.close();
        // readline leaves its input open when we stop early
        if ("destroy" in stream && typeof stream.destroy === "function") stream.destroy();
    }
}

/**
 * Lines of a stops table, either a plain file or the stops.txt entry of a
 * GTFS zip. The zip is closed once the caller stops iterating.
 */
export async function* openStopLines(file: string): AsyncGenerator<string> {
    if (!isZip(file)) {
        yield* linesOf(fs.createReadStream(file, { encoding: "utf8" }));
        return;
    }

    const zip = new StreamZip.async({ file });
    try {
        const entries = await zip.entries();
        const key = Object.keys(entries).find(
            k => path.basename(k).toLowerCase() === STOPS_ENTRY
        );
        if (!key) throw new Error(`missing ${STOPS_ENTRY} in ${file}`);
        yield* linesOf(await zip.stream(key));
    } finally {
        await zip.close();
    }
}
