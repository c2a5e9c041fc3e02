/**
 * Reserved vocabulary shared by the builder, the spatial view and the
 * serializers. Existing consumers of the exported files match on these IRIs,
 * so they must not drift.
 */

export const EX_NS = "http://www.ejemplo.com/";
export const GEO_NS = "http://www.w3.org/2003/01/geo/wgs84_pos#";
export const RDF_NS = "http://www.w3.org/1999/02/22-rdf-syntax-ns#";
export const RDFS_NS = "http://www.w3.org/2000/01/rdf-schema#";
export const XSD_NS = "http://www.w3.org/2001/XMLSchema#";

export const RDF_TYPE = `${RDF_NS}type`;
export const RDFS_LABEL = `${RDFS_NS}label`;
export const GEO_LAT = `${GEO_NS}lat`;
export const GEO_LONG = `${GEO_NS}long`;
export const GEO_SPATIAL_THING = `${GEO_NS}SpatialThing`;
export const XSD_DECIMAL = `${XSD_NS}decimal`;

export const LABEL_LANGUAGE = "es";

// prefixes every store starts with (rdf is implied by the encoders)
export const DEFAULT_PREFIXES: Readonly<Record<string, string>> = {
    ex: EX_NS,
    geo: GEO_NS,
    rdfs: RDFS_NS,
    xsd: XSD_NS,
};

/** Local part of an IRI: whatever follows the last `#` or `/`. */
export function localName(iri: string): string {
    const cut = Math.max(iri.lastIndexOf("#"), iri.lastIndexOf("/"));
    return cut >= 0 ? iri.slice(cut + 1) : iri;
}
