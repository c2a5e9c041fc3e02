import "dotenv/config";

export type Config = {
    stopsFile: string;
    gtfsUrl?: string;
    outDir: string;
    lineLimit: number; // 0 = read everything
    delimiter: string;
};

export const DEFAULT_STOPS_FILE = "../google_transit/stops.txt";
export const DEFAULT_OUT_DIR = "out";
// keep test runs small unless told otherwise
export const DEFAULT_LINE_LIMIT = 200;

export function parseLimit(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === "") return fallback;
    const n = Number(value);
    return Number.isInteger(n) && n >= 0 ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    return {
        stopsFile: env.STOPS_FILE || DEFAULT_STOPS_FILE,
        gtfsUrl: env.GTFS_URL || undefined,
        outDir: env.OUT_DIR || DEFAULT_OUT_DIR,
        lineLimit: parseLimit(env.STOPS_LINE_LIMIT, DEFAULT_LINE_LIMIT),
        delimiter: ",",
    };
}

export const config = loadConfig();
