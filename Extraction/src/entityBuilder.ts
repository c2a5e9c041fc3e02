import { decimalLiteral, iri, langLiteral, type Fact, type GraphStore } from "./graphStore.js";
import type { StopRecord } from "./recordParser.js";
import {
    EX_NS,
    GEO_LAT,
    GEO_LONG,
    GEO_SPATIAL_THING,
    LABEL_LANGUAGE,
    RDF_TYPE,
    RDFS_LABEL,
} from "./vocabulary.js";

/** Subject IRI for a stop id: namespace + raw id, no escaping. */
export function stationIri(stopId: string): string {
    return EX_NS + stopId;
}

/**
 * Appends the four facts describing one stop and returns its subject.
 * Literals are built before anything is appended, so a bad coordinate leaves
 * the store untouched. Repeated ids are not merged.
 */
export function buildSpatialEntity(record: StopRecord, store: GraphStore): string {
    const subject = stationIri(record.id);
    const facts: Fact[] = [
        { subject, predicate: RDF_TYPE, object: iri(GEO_SPATIAL_THING) },
        { subject, predicate: RDFS_LABEL, object: langLiteral(record.name, LABEL_LANGUAGE) },
        { subject, predicate: GEO_LAT, object: decimalLiteral(record.lat, "latitude") },
        { subject, predicate: GEO_LONG, object: decimalLiteral(record.lon, "longitude") },
    ];
    facts.forEach(f => store.append(f));
    return subject;
}
