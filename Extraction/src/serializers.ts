import fs from "node:fs";
import path from "node:path";
import { DataFactory, Writer } from "n3";
import Papa from "papaparse";

import type { GraphStore, Term } from "./graphStore.js";
import type { Station } from "./spatialIndex.js";
import { RDF_NS, RDF_TYPE } from "./vocabulary.js";

const { namedNode, literal } = DataFactory;

export type GraphFormat = "turtle" | "rdfxml";

export const FORMAT_EXTENSION: Record<GraphFormat, string> = {
    turtle: ".ttl",
    rdfxml: ".rdf",
};

function toN3Term(term: Term) {
    switch (term.type) {
        case "iri":
            return namedNode(term.value);
        case "plain":
            return literal(term.value);
        case "lang":
            return literal(term.value, term.language);
        case "typed":
            return literal(term.value, namedNode(term.datatype));
    }
}

export function toTurtle(store: GraphStore): Promise<string> {
    const writer = new Writer({ prefixes: store.prefixes() });
    for (const fact of store.listAllFacts()) {
        writer.addQuad(namedNode(fact.subject), namedNode(fact.predicate), toN3Term(fact.object));
    }
    return new Promise((resolve, reject) => {
        writer.end((error, result) => (error ? reject(error) : resolve(result)));
    });
}

// ------------------------------
// RDF/XML (abbreviated form)
// ------------------------------

const NC_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export function escapeXml(text: string, attribute = false): string {
    let out = text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
    if (attribute) out = out.replace(/"/g, "&quot;").replace(/\n/g, "&#10;");
    return out;
}

/**
 * Prefix bookkeeping for element names. Namespaces the store does not
 * declare get generated `j.N` prefixes.
 */
class QNames {
    private readonly nsToPrefix = new Map<string, string>();
    private readonly declared: [string, string][] = [];
    private generated = 0;

    constructor(prefixes: Record<string, string>) {
        this.declare("rdf", RDF_NS);
        for (const [prefix, ns] of Object.entries(prefixes)) this.declare(prefix, ns);
    }

    private declare(prefix: string, ns: string) {
        if (this.nsToPrefix.has(ns) || this.declared.some(([p]) => p === prefix)) return;
        this.nsToPrefix.set(ns, prefix);
        this.declared.push([prefix, ns]);
    }

    qname(iri: string): string | undefined {
        const cut = Math.max(iri.lastIndexOf("#"), iri.lastIndexOf("/")) + 1;
        const ns = iri.slice(0, cut);
        const local = iri.slice(cut);
        if (!ns || !NC_NAME.test(local)) return;
        let prefix = this.nsToPrefix.get(ns);
        if (!prefix) {
            do {
                prefix = `j.${this.generated++}`;
            } while (this.declared.some(([p]) => p === prefix));
            this.declare(prefix, ns);
        }
        return `${prefix}:${local}`;
    }

    namespaces(): [string, string][] {
        return [...this.declared];
    }
}

function propertyElement(name: string, object: Term): string {
    switch (object.type) {
        case "iri":
            return `<${name} rdf:resource="${escapeXml(object.value, true)}"/>`;
        case "plain":
            return `<${name}>${escapeXml(object.value)}</${name}>`;
        case "lang":
            return `<${name} xml:lang="${escapeXml(object.language, true)}">${escapeXml(object.value)}</${name}>`;
        case "typed":
            return `<${name} rdf:datatype="${escapeXml(object.datatype, true)}">${escapeXml(object.value)}</${name}>`;
    }
}

/**
 * One node element per subject, in the order subjects first appeared. The
 * first rdf:type with a usable name becomes the element name.
 */
export function toRdfXml(store: GraphStore): string {
    const names = new QNames(store.prefixes());
    const body: string[] = [];

    for (const subject of store.subjects()) {
        const facts = Array.from(store.factsFor(subject));
        let element = "rdf:Description";
        const typeIndex = facts.findIndex(
            f => f.predicate === RDF_TYPE && f.object.type === "iri" && names.qname(f.object.value)
        );
        if (typeIndex >= 0) {
            const typeFact = facts[typeIndex];
            element = names.qname(typeFact.object.value) ?? element;
            facts.splice(typeIndex, 1);
        }

        body.push(`  <${element} rdf:about="${escapeXml(subject, true)}">`);
        for (const fact of facts) {
            const name = names.qname(fact.predicate);
            if (!name) throw new Error(`predicate cannot be written as RDF/XML: ${fact.predicate}`);
            body.push(`    ${propertyElement(name, fact.object)}`);
        }
        body.push(`  </${element}>`);
    }

    const xmlns = names
        .namespaces()
        .map(([prefix, ns]) => `    xmlns:${prefix}="${escapeXml(ns, true)}"`)
        .join("\n");

    return [`<rdf:RDF\n${xmlns}>`, ...body, "</rdf:RDF>", ""].join("\n");
}

export async function serializeGraph(store: GraphStore, format: GraphFormat): Promise<string> {
    return format === "turtle" ? toTurtle(store) : toRdfXml(store);
}

export async function writeGraph(store: GraphStore, file: string, format: GraphFormat): Promise<void> {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, await serializeGraph(store, format), "utf8");
}

/** Flat station listing next to the filtered graph, as CSV and JSON. */
export function writeStationTable(stations: Station[], csvFile: string, jsonFile: string): void {
    const rows = stations.map(s => ({ subject: s.subject, name: s.name, lat: s.lat, lon: s.lon }));
    fs.mkdirSync(path.dirname(csvFile), { recursive: true });
    fs.writeFileSync(csvFile, Papa.unparse(rows), "utf8");
    fs.writeFileSync(jsonFile, JSON.stringify({ stations: rows }, null, 2), "utf8");
}
