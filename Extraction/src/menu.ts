import {
    AREA_PRESETS,
    boundsFromValues,
    DEFAULT_AREA,
    type GeographicBounds,
    isAreaPreset,
    parseBounds,
} from "./geoBounds.js";
import type { Logger } from "./logger.js";

export type AreaSelection =
    | { kind: "area"; bounds: GeographicBounds }
    | { kind: "all"; areas: GeographicBounds[] };

/** Anything that can ask a question and wait for a line: readline/promises or a test double. */
export interface Prompter {
    question(query: string): Promise<string>;
}

export const MENU = [
    "Select a geographic area to filter:",
    "1. Madrid (40.0-41.0 lat, -4.0--3.0 lon)",
    "2. Centro de España (39.0-41.0 lat, -5.0--3.0 lon)",
    "3. Extremadura (38.0-40.0 lat, -7.0--5.0 lon)",
    "4. Custom area",
    "5. All predefined areas",
];

const CUSTOM_NAME = "Personalizada";

function fallback(reason: string, logger: Logger): GeographicBounds {
    const bounds = AREA_PRESETS[DEFAULT_AREA];
    logger.error(`${reason}; using default area ${bounds}`);
    return bounds;
}

export function allAreas(): AreaSelection {
    return { kind: "all", areas: Object.values(AREA_PRESETS) };
}

/**
 * Resolves command-line flags. Bad custom bounds or an unknown preset never
 * stop the run, they fall back to the default rectangle.
 */
export function selectionFromFlags(
    flags: { area?: string; bounds?: string; allAreas?: boolean },
    logger: Logger = console
): AreaSelection {
    if (flags.allAreas) return allAreas();

    if (flags.bounds !== undefined) {
        const bounds = parseBounds(flags.bounds, CUSTOM_NAME);
        return { kind: "area", bounds: bounds ?? fallback(`invalid bounds "${flags.bounds}"`, logger) };
    }

    const name = (flags.area ?? DEFAULT_AREA).toLowerCase();
    if (!isAreaPreset(name)) {
        return { kind: "area", bounds: fallback(`unknown area "${flags.area}"`, logger) };
    }
    return { kind: "area", bounds: AREA_PRESETS[name] };
}

async function promptCustomBounds(prompter: Prompter, logger: Logger): Promise<GeographicBounds> {
    logger.log("\nEnter the corners of the rectangle:");
    const values = [
        await prompter.question("Min latitude: "),
        await prompter.question("Max latitude: "),
        await prompter.question("Min longitude: "),
        await prompter.question("Max longitude: "),
    ];
    return boundsFromValues(values, CUSTOM_NAME) ?? fallback("invalid coordinates", logger);
}

export async function promptSelection(prompter: Prompter, logger: Logger = console): Promise<AreaSelection> {
    MENU.forEach(line => logger.log(line));
    const answer = (await prompter.question("Option (1-5): ")).trim();

    switch (answer) {
        case "1":
            return { kind: "area", bounds: AREA_PRESETS.madrid };
        case "2":
            return { kind: "area", bounds: AREA_PRESETS.centro };
        case "3":
            return { kind: "area", bounds: AREA_PRESETS.extremadura };
        case "4":
            return { kind: "area", bounds: await promptCustomBounds(prompter, logger) };
        case "5":
            return allAreas();
        default:
            return { kind: "area", bounds: fallback(`invalid option "${answer}"`, logger) };
    }
}

/** Yes/no question, anything starting with s or y counts as yes. */
export async function confirm(prompter: Prompter, query: string): Promise<boolean> {
    const answer = (await prompter.question(query)).trim().toLowerCase();
    return answer.startsWith("s") || answer.startsWith("y");
}
