/**
 * Rectangular areas used to cut the station graph. Edges are inclusive, so a
 * stop sitting exactly on a border belongs to the area.
 */
export class GeographicBounds {
    constructor(
        readonly minLat: number,
        readonly maxLat: number,
        readonly minLon: number,
        readonly maxLon: number,
        readonly name = "Personalizada"
    ) {
        Object.freeze(this);
    }

    contains(lat: number, lon: number): boolean {
        return lat >= this.minLat && lat <= this.maxLat &&
            lon >= this.minLon && lon <= this.maxLon;
    }

    /** File-friendly version of the name: "Centro de España" -> "centro_de_españa". */
    get slug(): string {
        return this.name.toLowerCase().trim().replace(/\s+/g, "_");
    }

    toString(): string {
        const f = (n: number) => n.toFixed(3);
        return `${this.name} [lat: ${f(this.minLat)}-${f(this.maxLat)}, lon: ${f(this.minLon)}-${f(this.maxLon)}]`;
    }
}

export const AREA_PRESETS = {
    madrid: new GeographicBounds(40.0, 41.0, -4.0, -3.0, "Madrid"),
    centro: new GeographicBounds(39.0, 41.0, -5.0, -3.0, "Centro de España"),
    extremadura: new GeographicBounds(38.0, 40.0, -7.0, -5.0, "Extremadura"),
    cataluna: new GeographicBounds(40.0, 42.0, 0.0, 3.0, "Cataluña"),
    norte: new GeographicBounds(41.0, 44.0, -3.0, 3.0, "Norte de España"),
    sur: new GeographicBounds(36.0, 39.0, -6.0, -2.0, "Sur de España"),
} satisfies Record<string, GeographicBounds>;

export type AreaPreset = keyof typeof AREA_PRESETS;

// what custom input falls back to when it does not parse
export const DEFAULT_AREA: AreaPreset = "madrid";

export function isAreaPreset(name: string): name is AreaPreset {
    return Object.prototype.hasOwnProperty.call(AREA_PRESETS, name);
}

function parseCoordinate(text: string): number | undefined {
    const trimmed = text.trim();
    if (!trimmed) return;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : undefined;
}

/**
 * Four bounds in minLat, maxLat, minLon, maxLon order. Returns undefined when
 * any of them is not a finite number.
 */
export function boundsFromValues(values: string[], name?: string): GeographicBounds | undefined {
    if (values.length !== 4) return;
    const nums = values.map(parseCoordinate);
    const [minLat, maxLat, minLon, maxLon] = nums;
    if (minLat === undefined || maxLat === undefined || minLon === undefined || maxLon === undefined) {
        return;
    }
    return new GeographicBounds(minLat, maxLat, minLon, maxLon, name);
}

/** "40,41,-4,-3" style text from the command line. */
export function parseBounds(text: string, name?: string): GeographicBounds | undefined {
    return boundsFromValues(text.split(","), name);
}
