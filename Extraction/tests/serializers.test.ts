import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import Papa from "papaparse";

import { buildSpatialEntity, stationIri } from "../src/entityBuilder.js";
import { GraphStore, iri, plainLiteral } from "../src/graphStore.js";
import { escapeXml, toRdfXml, toTurtle, writeGraph, writeStationTable } from "../src/serializers.js";
import { DEFAULT_PREFIXES } from "../src/vocabulary.js";

function atochaStore() {
    const store = new GraphStore(DEFAULT_PREFIXES);
    buildSpatialEntity({ id: "ST1", name: "Atocha", lat: "40.5", lon: "-3.7" }, store);
    return store;
}

describe("toRdfXml", () => {
    it("writes one typed node per station", () => {
        expect(toRdfXml(atochaStore())).toBe(
            [
                "<rdf:RDF",
                '    xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#"',
                '    xmlns:ex="http://www.ejemplo.com/"',
                '    xmlns:geo="http://www.w3.org/2003/01/geo/wgs84_pos#"',
                '    xmlns:rdfs="http://www.w3.org/2000/01/rdf-schema#"',
                '    xmlns:xsd="http://www.w3.org/2001/XMLSchema#">',
                '  <geo:SpatialThing rdf:about="http://www.ejemplo.com/ST1">',
                '    <rdfs:label xml:lang="es">Atocha</rdfs:label>',
                '    <geo:lat rdf:datatype="http://www.w3.org/2001/XMLSchema#decimal">40.5</geo:lat>',
                '    <geo:long rdf:datatype="http://www.w3.org/2001/XMLSchema#decimal">-3.7</geo:long>',
                "  </geo:SpatialThing>",
                "</rdf:RDF>",
                "",
            ].join("\n")
        );
    });

    it("escapes text and declares unknown namespaces", () => {
        const store = new GraphStore(DEFAULT_PREFIXES);
        store.add(stationIri("X&Y"), "http://purl.org/dc/terms/title", plainLiteral("R&D <lab>"));
        store.add(stationIri("X&Y"), "http://purl.org/dc/terms/source", iri("http://example.org/?a=1&b=2"));

        const xml = toRdfXml(store);
        expect(xml).toContain('    xmlns:j.0="http://purl.org/dc/terms/">');
        expect(xml).toContain('  <rdf:Description rdf:about="http://www.ejemplo.com/X&amp;Y">');
        expect(xml).toContain("    <j.0:title>R&amp;D &lt;lab&gt;</j.0:title>");
        expect(xml).toContain('    <j.0:source rdf:resource="http://example.org/?a=1&amp;b=2"/>');
    });

    it("skips generated prefixes the store already uses", () => {
        const store = new GraphStore({ ...DEFAULT_PREFIXES, "j.0": "http://example.org/taken/" });
        store.add(stationIri("S1"), "http://purl.org/dc/terms/title", plainLiteral("Sol"));

        const xml = toRdfXml(store);
        expect(xml).toContain('    xmlns:j.0="http://example.org/taken/"');
        expect(xml).toContain('    xmlns:j.1="http://purl.org/dc/terms/">');
        expect(xml).toContain("    <j.1:title>Sol</j.1:title>");
    });

    it("refuses a predicate with no usable local name", () => {
        const store = new GraphStore();
        store.add(stationIri("A"), "http://example.org/props/123", plainLiteral("x"));
        expect(() => toRdfXml(store)).toThrowError("predicate cannot be written as RDF/XML");
    });
});

describe("escapeXml", () => {
    it("escapes quotes only inside attributes", () => {
        expect(escapeXml('"a"')).toBe('"a"');
        expect(escapeXml('"a"', true)).toBe("&quot;a&quot;");
    });
});

describe("toTurtle", () => {
    it("uses the store prefixes", async () => {
        const ttl = await toTurtle(atochaStore());
        expect(ttl).toContain("@prefix geo: <http://www.w3.org/2003/01/geo/wgs84_pos#>.");
        expect(ttl).toContain("ex:ST1 a geo:SpatialThing");
        expect(ttl).toContain('rdfs:label "Atocha"@es');
    });
});

describe("file output", () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "stops-graph-"));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("writes the graph into nested directories", async () => {
        const file = path.join(dir, "nested", "estaciones.rdf");
        await writeGraph(atochaStore(), file, "rdfxml");
        expect(fs.readFileSync(file, "utf8")).toBe(toRdfXml(atochaStore()));
    });

    it("writes the station table as csv and json", () => {
        const stations = [{ subject: stationIri("ST1"), name: "Atocha", lat: 40.5, lon: -3.7 }];
        const csv = path.join(dir, "t.csv");
        const json = path.join(dir, "t.json");
        writeStationTable(stations, csv, json);

        const parsed = Papa.parse<Record<string, string>>(fs.readFileSync(csv, "utf8"), { header: true });
        expect(parsed.data).toEqual([
            { subject: "http://www.ejemplo.com/ST1", name: "Atocha", lat: "40.5", lon: "-3.7" },
        ]);
        expect(JSON.parse(fs.readFileSync(json, "utf8"))).toEqual({ stations });
    });
});
