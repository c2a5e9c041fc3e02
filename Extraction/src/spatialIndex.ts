import { MissingCoordinateError, InvalidCoordinateError } from "./errors.js";
import { iri, isDecimalLexical, type GraphStore, type Term } from "./graphStore.js";
import { GEO_LAT, GEO_LONG, GEO_SPATIAL_THING, RDF_TYPE, RDFS_LABEL } from "./vocabulary.js";

export const UNNAMED_STATION = "Sin nombre";

export type Station = {
    subject: string;
    name: string;
    lat: number;
    lon: number;
};

export type ExtractionFailure = {
    subject: string;
    error: Error;
};

function coordinate(store: GraphStore, subject: string, predicate: string, field: string): number {
    const term = store.firstObject(subject, predicate);
    if (!term) throw new MissingCoordinateError(subject, predicate);
    return termToNumber(term, field);
}

function termToNumber(term: Term, field: string): number {
    if (term.type === "typed") return term.number;
    if (term.type === "iri" || !isDecimalLexical(term.value.trim())) {
        throw new InvalidCoordinateError(field, term.value);
    }
    return Number(term.value.trim());
}

/**
 * Reads one station back out of the store. The label is best effort; both
 * coordinates are required.
 */
export function extractStation(store: GraphStore, subject: string): Station {
    const label = store.firstObject(subject, RDFS_LABEL);
    return {
        subject,
        name: label ? label.value : UNNAMED_STATION,
        lat: coordinate(store, subject, GEO_LAT, "latitude"),
        lon: coordinate(store, subject, GEO_LONG, "longitude"),
    };
}

export function spatialSubjects(store: GraphStore): ReadonlySet<string> {
    return store.subjectsWith(RDF_TYPE, iri(GEO_SPATIAL_THING));
}

/**
 * Every subject typed geo:SpatialThing, in index order. A subject that cannot
 * be read is reported in `failures` and enumeration carries on.
 */
export function listSpatialEntities(store: GraphStore): {
    stations: Station[];
    failures: ExtractionFailure[];
} {
    const stations: Station[] = [];
    const failures: ExtractionFailure[] = [];
    for (const subject of spatialSubjects(store)) {
        try {
            stations.push(extractStation(store, subject));
        } catch (err) {
            failures.push({ subject, error: err instanceof Error ? err : new Error(String(err)) });
        }
    }
    return { stations, failures };
}
