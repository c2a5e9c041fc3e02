import { buildSpatialEntity } from "./entityBuilder.js";
import { describeError } from "./errors.js";
import type { GraphStore } from "./graphStore.js";
import type { Logger } from "./logger.js";
import { parseRecord } from "./recordParser.js";

export type IngestOptions = {
    limit?: number; // data lines to read, 0 or undefined = all
    delimiter?: string;
    logger?: Logger;
    progressEvery?: number;
};

export type IngestFailure = {
    line: number; // 1-based, header excluded
    content: string;
    error: Error;
};

export type IngestReport = {
    header?: string;
    linesRead: number;
    processed: number;
    failures: IngestFailure[];
};

/**
 * Best-effort load of a stops table into `store`. The first line is the
 * header; every bad row is logged and skipped.
 */
export async function ingestStops(
    lines: Iterable<string> | AsyncIterable<string>,
    store: GraphStore,
    { limit = 0, delimiter = ",", logger = console, progressEvery = 50 }: IngestOptions = {}
): Promise<IngestReport> {
    const report: IngestReport = { linesRead: 0, processed: 0, failures: [] };

    for await (const line of lines) {
        if (report.header === undefined) {
            report.header = line;
            logger.log(`header: ${line}`);
            continue;
        }
        if (limit > 0 && report.linesRead >= limit) break;
        report.linesRead++;

        if (!line.trim()) continue;

        try {
            buildSpatialEntity(parseRecord(line, delimiter), store);
            report.processed++;
            if (progressEvery > 0 && report.processed % progressEvery === 0) {
                logger.log(`processed ${report.processed} stations…`);
            }
        } catch (err) {
            const error = err instanceof Error ? err : new Error(String(err));
            report.failures.push({ line: report.linesRead, content: line, error });
            logger.error(`Error on line ${report.linesRead}: ${line}`);
            logger.error(`  ${describeError(error)}`);
        }
    }

    logger.log(`Lines processed: ${report.processed} of ${report.linesRead}`);
    return report;
}
