import type { GeographicBounds } from "./geoBounds.js";
import type { Fact, GraphStore, Term } from "./graphStore.js";
import type { Logger } from "./logger.js";
import { spatialSubjects, type Station } from "./spatialIndex.js";
import { localName } from "./vocabulary.js";

export type StoreStatistics = {
    facts: number;
    stations: number;
    factsPerStation: number;
};

export function collectStatistics(store: GraphStore): StoreStatistics {
    const stations = spatialSubjects(store).size;
    return {
        facts: store.size,
        stations,
        factsPerStation: stations ? Math.floor(store.size / stations) : 0,
    };
}

export function showStatistics(store: GraphStore, logger: Logger = console): StoreStatistics {
    const stats = collectStatistics(store);
    logger.log("Graph statistics:");
    logger.log(`  facts:              ${stats.facts}`);
    logger.log(`  stations:           ${stats.stations}`);
    logger.log(`  facts per station:  ${stats.factsPerStation}`);
    return stats;
}

export function formatTerm(term: Term): string {
    switch (term.type) {
        case "iri":
            return term.value;
        case "plain":
            return term.value;
        case "lang":
            return `"${term.value}"@${term.language}`;
        case "typed":
            return `"${term.value}"^^${term.datatype}`;
    }
}

/** `label → "Atocha"@es` */
export function formatFact(fact: Fact): string {
    return `${localName(fact.predicate)} → ${formatTerm(fact.object)}`;
}

/** First `limit` facts as raw `subject predicate object` lines. */
export function printSample(store: GraphStore, limit = 20, logger: Logger = console): string[] {
    const lines: string[] = [];
    for (const fact of store.listAllFacts()) {
        if (lines.length >= limit) break;
        lines.push(`${fact.subject} ${fact.predicate} ${formatTerm(fact.object)}`);
    }
    logger.log(`Graph sample (first ${lines.length} facts):`);
    lines.forEach(l => logger.log(l));
    return lines;
}

/** First few stations with every fact they carry. */
export function printStationSample(store: GraphStore, count = 3, logger: Logger = console): void {
    let shown = 0;
    for (const subject of spatialSubjects(store)) {
        if (shown >= count) break;
        shown++;
        logger.log(`\nStation ${shown}:`);
        for (const fact of store.factsFor(subject)) {
            logger.log(`  ${formatFact(fact)}`);
        }
    }
}

export function formatStation(station: Station): string {
    return `${station.name.padEnd(40)} (${station.lat.toFixed(4)}, ${station.lon.toFixed(4)}) [${localName(station.subject)}]`;
}

export function printFilteredStations(
    stations: Station[],
    bounds: GeographicBounds,
    logger: Logger = console
): void {
    logger.log(`\n=== Stations in ${bounds.name.toUpperCase()} ===`);
    if (!stations.length) {
        logger.log("No stations found in the selected area.");
        return;
    }
    stations.forEach((s, i) => {
        logger.log(`${String(i + 1).padStart(2)}. ${formatStation(s)}`);
    });
}
