import { InvalidCoordinateError } from "./errors.js";
import { XSD_DECIMAL } from "./vocabulary.js";

export type Iri = { readonly type: "iri"; readonly value: string };
export type PlainLiteral = { readonly type: "plain"; readonly value: string };
export type LangLiteral = { readonly type: "lang"; readonly value: string; readonly language: string };
// lexical form kept next to the parsed number
export type TypedLiteral = {
    readonly type: "typed";
    readonly value: string;
    readonly datatype: string;
    readonly number: number;
};

export type Literal = PlainLiteral | LangLiteral | TypedLiteral;
export type Term = Iri | Literal;

export interface Fact {
    readonly subject: string;
    readonly predicate: string;
    readonly object: Term;
}

const DECIMAL_LEXICAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export function isDecimalLexical(text: string): boolean {
    return DECIMAL_LEXICAL.test(text);
}

export function iri(value: string): Iri {
    return { type: "iri", value };
}

export function plainLiteral(value: string): PlainLiteral {
    return { type: "plain", value };
}

export function langLiteral(value: string, language: string): LangLiteral {
    return { type: "lang", value, language };
}

/**
 * xsd:decimal literal from its lexical form. `field` only labels the error.
 */
export function decimalLiteral(text: string, field = "decimal"): TypedLiteral {
    if (!isDecimalLexical(text)) throw new InvalidCoordinateError(field, text);
    const number = Number(text);
    if (!Number.isFinite(number)) throw new InvalidCoordinateError(field, text);
    return { type: "typed", value: text, datatype: XSD_DECIMAL, number };
}

/** Stable key for a term, N-Triples flavoured. */
export function termKey(term: Term): string {
    switch (term.type) {
        case "iri":
            return `<${term.value}>`;
        case "plain":
            return JSON.stringify(term.value);
        case "lang":
            return `${JSON.stringify(term.value)}@${term.language}`;
        case "typed":
            return `${JSON.stringify(term.value)}^^<${term.datatype}>`;
    }
}

function predicateObjectKey(predicate: string, object: Term): string {
    return `<${predicate}> ${termKey(object)}`;
}

/**
 * Append-only fact log. Both indexes hold the same Fact objects as the base
 * sequence. Nothing is removed or rewritten.
 */
export class GraphStore {
    private readonly facts: Fact[] = [];
    private readonly bySubject = new Map<string, Fact[]>();
    private readonly byPredicateObject = new Map<string, Set<string>>();
    private readonly prefixMap = new Map<string, string>();

    constructor(prefixes: Readonly<Record<string, string>> = {}) {
        for (const [prefix, ns] of Object.entries(prefixes)) {
            this.prefixMap.set(prefix, ns);
        }
    }

    /** Empty store carrying the namespace prefixes of `other`. */
    static withPrefixesOf(other: GraphStore): GraphStore {
        return new GraphStore(other.prefixes());
    }

    get size(): number {
        return this.facts.length;
    }

    append(fact: Fact): void {
        const stored: Fact = Object.freeze({
            subject: fact.subject,
            predicate: fact.predicate,
            object: Object.freeze({ ...fact.object }),
        });
        this.facts.push(stored);

        let subjectFacts = this.bySubject.get(stored.subject);
        if (!subjectFacts) {
            subjectFacts = [];
            this.bySubject.set(stored.subject, subjectFacts);
        }
        subjectFacts.push(stored);

        const key = predicateObjectKey(stored.predicate, stored.object);
        let subjects = this.byPredicateObject.get(key);
        if (!subjects) {
            subjects = new Set();
            this.byPredicateObject.set(key, subjects);
        }
        subjects.add(stored.subject);
    }

    add(subject: string, predicate: string, object: Term): void {
        this.append({ subject, predicate, object });
    }

    *factsFor(subject: string): IterableIterator<Fact> {
        const subjectFacts = this.bySubject.get(subject);
        if (!subjectFacts) return;
        yield* subjectFacts;
    }

    subjectsWith(predicate: string, object: Term): ReadonlySet<string> {
        return new Set(this.byPredicateObject.get(predicateObjectKey(predicate, object)));
    }

    firstObject(subject: string, predicate: string): Term | undefined {
        for (const fact of this.factsFor(subject)) {
            if (fact.predicate === predicate) return fact.object;
        }
        return undefined;
    }

    *listAllFacts(): IterableIterator<Fact> {
        yield* this.facts;
    }

    /** Subjects in order of their first fact. */
    subjects(): string[] {
        return Array.from(this.bySubject.keys());
    }

    setPrefix(prefix: string, ns: string): void {
        this.prefixMap.set(prefix, ns);
    }

    prefixes(): Record<string, string> {
        return Object.fromEntries(this.prefixMap);
    }
}
