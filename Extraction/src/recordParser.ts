import { parse } from "csv-parse/sync";

import { InvalidCoordinateError, MalformedRecordError, MissingRequiredFieldError } from "./errors.js";
import { isDecimalLexical } from "./graphStore.js";

// stops.txt column positions we care about
// stop_id,stop_code,stop_name,stop_desc,stop_lat,stop_lon,zone_id,...
const FIELD_ID = 0;
const FIELD_NAME = 2;
const FIELD_LAT = 4;
const FIELD_LON = 5;
const MIN_FIELDS = 6;

export type StopRecord = {
    id: string;
    name: string;
    lat: string; // trimmed decimal text, kept verbatim for the literal
    lon: string;
};

/**
 * Plain delimiter split. Quoting is switched off on purpose to match the
 * files consumers already have: a label with a comma in it will misparse.
 */
export function splitFields(line: string, delimiter = ","): string[] {
    const rows: string[][] = parse(line, {
        delimiter,
        quote: false,
        relax_column_count: true,
    });
    return rows[0] ?? [];
}

export function parseRecord(line: string, delimiter = ","): StopRecord {
    const fields = splitFields(line, delimiter);
    if (fields.length < MIN_FIELDS) {
        throw new MalformedRecordError(fields.length, MIN_FIELDS);
    }

    const record: StopRecord = {
        id: fields[FIELD_ID].trim(),
        name: fields[FIELD_NAME].trim(),
        lat: fields[FIELD_LAT].trim(),
        lon: fields[FIELD_LON].trim(),
    };

    if (!record.id) throw new MissingRequiredFieldError("stop_id");
    if (!record.name) throw new MissingRequiredFieldError("stop_name");
    if (!record.lat) throw new MissingRequiredFieldError("stop_lat");
    if (!record.lon) throw new MissingRequiredFieldError("stop_lon");

    if (!isDecimalLexical(record.lat)) throw new InvalidCoordinateError("latitude", record.lat);
    if (!isDecimalLexical(record.lon)) throw new InvalidCoordinateError("longitude", record.lon);

    return record;
}
