import { describeError } from "./errors.js";
import type { GeographicBounds } from "./geoBounds.js";
import { GraphStore } from "./graphStore.js";
import type { Logger } from "./logger.js";
import { listSpatialEntities, type ExtractionFailure, type Station } from "./spatialIndex.js";

export type FilterOptions = {
    logger?: Logger;
};

export type FilterResult = {
    bounds: GeographicBounds;
    stations: Station[];
    examined: number;
    retained: number;
    failures: ExtractionFailure[];
};

export function percentage(part: number, total: number): string {
    if (total === 0) return "n/a";
    return `${((part * 100) / total).toFixed(1)}%`;
}

/**
 * Stations inside `bounds`, in subject-index order. Membership only looks at
 * the two coordinates.
 */
export function filterInBounds(
    store: GraphStore,
    bounds: GeographicBounds,
    { logger = console }: FilterOptions = {}
): FilterResult {
    logger.log(`Filtering stations in ${bounds}`);

    const { stations, failures } = listSpatialEntities(store);
    for (const { subject, error } of failures) {
        logger.error(`Error reading station ${subject}: ${describeError(error)}`);
    }

    const inside = stations.filter(s => bounds.contains(s.lat, s.lon));
    const examined = stations.length + failures.length;

    logger.log(`  examined: ${examined}`);
    logger.log(`  in area:  ${inside.length}`);
    logger.log(`  share:    ${percentage(inside.length, examined)}`);

    return {
        bounds,
        stations: inside,
        examined,
        retained: inside.length,
        failures,
    };
}

/**
 * New store holding every fact of every retained subject, not only the
 * coordinates that decided membership. Prefixes travel with it.
 */
export function buildFilteredGraph(
    store: GraphStore,
    bounds: GeographicBounds,
    options: FilterOptions = {}
): { graph: GraphStore; result: FilterResult } {
    const logger = options.logger ?? console;
    const result = filterInBounds(store, bounds, { logger });
    const graph = GraphStore.withPrefixesOf(store);

    for (const station of result.stations) {
        for (const fact of store.factsFor(station.subject)) {
            graph.append(fact);
        }
    }

    logger.log(`Filtered graph built with ${graph.size} facts`);
    return { graph, result };
}
