import { beforeEach, describe, it, expect } from "vitest";

import { buildFilteredGraph, filterInBounds, percentage } from "../src/boundsFilter.js";
import { buildSpatialEntity, stationIri } from "../src/entityBuilder.js";
import { GeographicBounds } from "../src/geoBounds.js";
import { decimalLiteral, GraphStore, iri, plainLiteral } from "../src/graphStore.js";
import { silentLogger } from "../src/logger.js";
import { DEFAULT_PREFIXES, GEO_LAT, GEO_SPATIAL_THING, RDF_TYPE } from "../src/vocabulary.js";

const MADRID = new GeographicBounds(40.0, 41.0, -4.0, -3.0, "Madrid");
const opts = { logger: silentLogger };
const NOTE = "http://purl.org/dc/terms/description";

describe("filterInBounds", () => {
    let store: GraphStore;

    beforeEach(() => {
        store = new GraphStore(DEFAULT_PREFIXES);
        buildSpatialEntity({ id: "ST1", name: "Atocha", lat: "40.5", lon: "-3.7" }, store);
        buildSpatialEntity({ id: "ST2", name: "Remote", lat: "10.0", lon: "10.0" }, store);
        buildSpatialEntity({ id: "ST3", name: "Chamartín", lat: "40.47", lon: "-3.68" }, store);
    });

    it("keeps stations inside the rectangle in index order", () => {
        const result = filterInBounds(store, MADRID, opts);

        expect(result.stations).toEqual([
            { subject: stationIri("ST1"), name: "Atocha", lat: 40.5, lon: -3.7 },
            { subject: stationIri("ST3"), name: "Chamartín", lat: 40.47, lon: -3.68 },
        ]);
        expect(result.examined).toBe(3);
        expect(result.retained).toBe(2);
        expect(result.failures).toEqual([]);
    });

    it("counts an excluded station as examined only", () => {
        const only = new GraphStore();
        buildSpatialEntity({ id: "ST2", name: "Remote", lat: "10.0", lon: "10.0" }, only);
        const result = filterInBounds(only, MADRID, opts);
        expect(result.examined).toBe(1);
        expect(result.retained).toBe(0);
    });

    it("counts unreadable stations as examined and logs them", () => {
        store.add(stationIri("BAD"), RDF_TYPE, iri(GEO_SPATIAL_THING));
        const errors: string[] = [];
        const result = filterInBounds(store, MADRID, {
            logger: { log: () => {}, error: (msg: string) => errors.push(msg) },
        });

        expect(result.examined).toBe(4);
        expect(result.retained).toBe(2);
        expect(result.failures.map(f => f.subject)).toEqual([stationIri("BAD")]);
        expect(errors).toEqual([
            `Error reading station ${stationIri("BAD")}: ${stationIri("BAD")} has no ${GEO_LAT} fact`,
        ]);
    });
});

describe("buildFilteredGraph", () => {
    it("copies every fact of the retained subjects and nothing else", () => {
        const store = new GraphStore(DEFAULT_PREFIXES);
        buildSpatialEntity({ id: "ST1", name: "Atocha", lat: "40.5", lon: "-3.7" }, store);
        buildSpatialEntity({ id: "ST2", name: "Remote", lat: "10.0", lon: "10.0" }, store);
        store.add(stationIri("ST1"), NOTE, plainLiteral("main hub"));
        store.add(stationIri("ST2"), NOTE, plainLiteral("far away"));

        const { graph, result } = buildFilteredGraph(store, MADRID, opts);

        expect(result.retained).toBe(1);
        expect(graph.size).toBe(5);
        expect(Array.from(graph.factsFor(stationIri("ST1")))).toEqual(
            Array.from(store.factsFor(stationIri("ST1")))
        );
        expect(graph.subjects()).toEqual([stationIri("ST1")]);
        expect(graph.prefixes()).toEqual(store.prefixes());
    });

    it("carries both copies of a station that was ingested twice", () => {
        const store = new GraphStore();
        const record = { id: "ST1", name: "Atocha", lat: "40.5", lon: "-3.7" };
        buildSpatialEntity(record, store);
        buildSpatialEntity(record, store);

        const { graph, result } = buildFilteredGraph(store, MADRID, opts);
        expect(result.retained).toBe(1);
        expect(graph.size).toBe(8);
    });

    it("keeps subject order across stations and fact order within them", () => {
        const store = new GraphStore();
        buildSpatialEntity({ id: "B", name: "Beta", lat: "40.2", lon: "-3.2" }, store);
        buildSpatialEntity({ id: "A", name: "Alfa", lat: "40.1", lon: "-3.1" }, store);
        store.add(stationIri("B"), NOTE, plainLiteral("late fact"));

        const { graph } = buildFilteredGraph(store, MADRID, opts);
        const facts = Array.from(graph.listAllFacts());
        expect(facts.map(f => f.subject)).toEqual([
            stationIri("B"), stationIri("B"), stationIri("B"), stationIri("B"), stationIri("B"),
            stationIri("A"), stationIri("A"), stationIri("A"), stationIri("A"),
        ]);
        expect(facts[4].predicate).toBe(NOTE);
    });

    it("gives the same stations when filtering its own output again", () => {
        const store = new GraphStore(DEFAULT_PREFIXES);
        buildSpatialEntity({ id: "ST1", name: "Atocha", lat: "40.5", lon: "-3.7" }, store);
        buildSpatialEntity({ id: "ST2", name: "Remote", lat: "10.0", lon: "10.0" }, store);
        buildSpatialEntity({ id: "ST4", name: "Border", lat: "41.0", lon: "-4.0" }, store);
        store.add(stationIri("ST4"), GEO_LAT, decimalLiteral("99"));

        const once = buildFilteredGraph(store, MADRID, opts);
        const twice = buildFilteredGraph(once.graph, MADRID, opts);

        expect(twice.result.stations).toEqual(once.result.stations);
        expect(twice.graph.size).toBe(once.graph.size);
    });
});

describe("percentage", () => {
    it("formats one decimal and handles an empty total", () => {
        expect(percentage(2, 3)).toBe("66.7%");
        expect(percentage(0, 0)).toBe("n/a");
    });
});
