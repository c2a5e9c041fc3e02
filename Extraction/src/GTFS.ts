#!/usr/bin/env node
/**
 * Entry point. Reads a GTFS stops table (plain stops.txt or the feed zip),
 * turns every stop into a geo:SpatialThing in an RDF graph, writes the graph
 * as Turtle and RDF/XML, then cuts out the stations inside one or more
 * rectangles and writes those subgraphs next to it.
 */

import fs from "node:fs";
import path from "node:path";
import readline from "node:readline/promises";
import { Command } from "commander";

import { buildFilteredGraph } from "./boundsFilter.js";
import { config, parseLimit, type Config } from "./config.js";
import { describeError } from "./errors.js";
import type { GeographicBounds } from "./geoBounds.js";
import { GraphStore } from "./graphStore.js";
import { openStopLines, resolveStopsFile } from "./gtfsUtils.js";
import { ingestStops } from "./ingest.js";
import { confirm, promptSelection, selectionFromFlags, type AreaSelection } from "./menu.js";
import { printFilteredStations, printSample, printStationSample, showStatistics } from "./report.js";
import { FORMAT_EXTENSION, writeGraph, writeStationTable } from "./serializers.js";
import { DEFAULT_PREFIXES } from "./vocabulary.js";

const BASE_NAME = "estaciones";

type CliOptions = {
    stops?: string;
    out?: string;
    limit?: string;
    area?: string;
    bounds?: string;
    allAreas?: boolean;
    interactive?: boolean;
    sample?: boolean;
};

/**
 * Filters one area and writes its subgraph plus a flat station table.
 * Areas with no stations are skipped when `skipEmpty` is set.
 */
async function exportArea(store: GraphStore, bounds: GeographicBounds, outDir: string, skipEmpty: boolean) {
    const { graph, result } = buildFilteredGraph(store, bounds);
    printFilteredStations(result.stations, bounds);
    if (skipEmpty && !result.retained) return;

    const base = path.join(outDir, `${BASE_NAME}_${bounds.slug}`);
    await writeGraph(graph, base + FORMAT_EXTENSION.turtle, "turtle");
    writeStationTable(result.stations, base + ".csv", base + ".json");
    console.log(`saved: ${base}${FORMAT_EXTENSION.turtle}`);
}

async function run(opts: CliOptions) {
    const cfg: Config = {
        ...config,
        stopsFile: opts.stops ?? config.stopsFile,
        outDir: opts.out ?? config.outDir,
        lineLimit: parseLimit(opts.limit, config.lineLimit),
    };
    fs.mkdirSync(cfg.outDir, { recursive: true });

    const rl = opts.interactive
        ? readline.createInterface({ input: process.stdin, output: process.stdout })
        : undefined;

    try {
        // --- part 1: stops -> graph ---
        const stopsFile = await resolveStopsFile(cfg);
        console.log(`reading ${stopsFile}`);

        const store = new GraphStore(DEFAULT_PREFIXES);
        await ingestStops(openStopLines(stopsFile), store, {
            limit: cfg.lineLimit,
            delimiter: cfg.delimiter,
        });
        showStatistics(store);

        for (const format of ["turtle", "rdfxml"] as const) {
            const file = path.join(cfg.outDir, BASE_NAME + FORMAT_EXTENSION[format]);
            await writeGraph(store, file, format);
            console.log(`graph written to ${file}`);
        }

        const wantSample = rl
            ? await confirm(rl, "\nShow a sample of the generated graph? (y/n): ")
            : Boolean(opts.sample);
        if (wantSample) {
            printSample(store);
            printStationSample(store);
        }

        // --- part 2: geographic filter ---
        const selection: AreaSelection = rl
            ? await promptSelection(rl)
            : selectionFromFlags(opts);

        if (selection.kind === "all") {
            for (const area of selection.areas) {
                await exportArea(store, area, cfg.outDir, true);
            }
        } else {
            await exportArea(store, selection.bounds, cfg.outDir, false);
        }

        console.log(`\nDone. Output in ${cfg.outDir}/`);
    } finally {
        rl?.close();
    }
}

const program = new Command();
program
    .name("stops-graph")
    .description("Build a geolocated RDF graph from a GTFS stops table and cut it by area")
    .option("--stops <path>", "stops.txt or GTFS zip (env STOPS_FILE)")
    .option("--out <dir>", "output directory (env OUT_DIR)")
    .option("--limit <n>", "max data lines to read, 0 = all (env STOPS_LINE_LIMIT)")
    .option("--area <preset>", "madrid | centro | extremadura | cataluna | norte | sur")
    .option("--bounds <minLat,maxLat,minLon,maxLon>", "custom rectangle")
    .option("--all-areas", "filter every predefined area")
    .option("-i, --interactive", "pick the area from a menu")
    .option("--sample", "print a sample of the graph")
    .action(async (opts: CliOptions) => {
        await run(opts);
    });

program.parseAsync(process.argv).catch(err => {
    console.error("run failed:", describeError(err));
    process.exitCode = 1;
});
