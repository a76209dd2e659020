/**
 * Municipal Forecast Pipeline — Raw Record Parser
 *
 * Flattens the provider's hourly municipal forecast (days → per-variable
 * period lists) into one raw record per forecast hour.
 */

import { z } from 'zod';
import { formatDayFirstDate, formatDayFirstDateTime, parseCalendarDate } from '../time';
import type { RawRecord } from '../types';

// =============================================================================
// Payload Contract
// =============================================================================

const ScalarSchema = z.union([z.string(), z.number()]);

const PeriodValueSchema = z
    .object({
        value: ScalarSchema,
        periodo: z.string()
    })
    .passthrough();

const SkyStateSchema = z
    .object({
        value: ScalarSchema.optional(),
        periodo: z.string(),
        descripcion: z.string()
    })
    .passthrough();

/**
 * Wind entries come in two shapes under the same list: direction + speed
 * (`direccion`, `velocidad`) and maximum gust (`value`). Only the first is read.
 */
const WindEntrySchema = z
    .object({
        periodo: z.string(),
        direccion: z.array(z.string()).optional(),
        velocidad: z.array(ScalarSchema).optional(),
        value: ScalarSchema.optional()
    })
    .passthrough();

const ForecastDaySchema = z
    .object({
        fecha: z.string(),
        temperatura: z.array(PeriodValueSchema),
        humedadRelativa: z.array(PeriodValueSchema).default([]),
        estadoCielo: z.array(SkyStateSchema).default([]),
        vientoAndRachaMax: z.array(WindEntrySchema).default([])
    })
    .passthrough();

export const ForecastPayloadSchema = z
    .array(
        z
            .object({
                nombre: z.string().optional(),
                prediccion: z.object({ dia: z.array(ForecastDaySchema) }).passthrough()
            })
            .passthrough()
    )
    .min(1);

export type ForecastPayload = z.infer<typeof ForecastPayloadSchema>;
export type ForecastDay = z.infer<typeof ForecastDaySchema>;

// =============================================================================
// Errors
// =============================================================================

/**
 * The payload does not have the expected forecast shape.
 */
export class PayloadError extends Error {
    constructor(
        message: string,
        public readonly issues: readonly string[] = []
    ) {
        super(message);
        this.name = 'PayloadError';
    }
}

// =============================================================================
// Parsing
// =============================================================================

const HOURS_PER_DAY = 24;

/**
 * Match a `periodo` against an hour of day. Range periods ("00-06") never match.
 */
function isPeriod(periodo: string, hour: number): boolean {
    return /^\d{1,2}$/.test(periodo) && Number(periodo) === hour;
}

function forecastDate(fecha: string): string {
    const date = parseCalendarDate(fecha.slice(0, 10));
    if (!date) {
        throw new PayloadError(`Unparseable forecast day: ${fecha}`);
    }
    return formatDayFirstDate(date);
}

/**
 * Emit one raw record per hour that has a temperature; the other variables
 * are null when the provider has no entry for that hour.
 */
export function parseForecastDay(day: ForecastDay, timestamp: string): RawRecord[] {
    const date = forecastDate(day.fecha);
    const rows: RawRecord[] = [];

    for (let hour = 0; hour < HOURS_PER_DAY; hour++) {
        const temperature = day.temperatura.find((item) => isPeriod(item.periodo, hour));
        if (!temperature) continue;

        const humidity = day.humedadRelativa.find((item) => isPeriod(item.periodo, hour));
        const sky = day.estadoCielo.find((item) => isPeriod(item.periodo, hour));
        const wind = day.vientoAndRachaMax.find((item) => isPeriod(item.periodo, hour) && item.direccion !== undefined);

        rows.push({
            date,
            hour,
            temperature: temperature.value,
            humidity: humidity?.value ?? null,
            sky_condition: sky?.descripcion ?? null,
            wind_direction: wind?.direccion?.[0] ?? null,
            wind_speed: wind?.velocidad?.[0] ?? null,
            timestamp
        });
    }

    return rows;
}

/**
 * Validate a payload and flatten it into raw records.
 *
 * The `timestamp` column is written in UTC, not the host's local time.
 *
 * @param payload - Decoded JSON from the data URL
 * @param collectedAt - Collection time recorded on every row
 */
export function parseForecastPayload(payload: unknown, collectedAt: Date): RawRecord[] {
    const result = ForecastPayloadSchema.safeParse(payload);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new PayloadError(`Unexpected forecast payload: ${issues.slice(0, 3).join('; ')}`, issues);
    }

    const timestamp = formatDayFirstDateTime(collectedAt);
    return result.data[0].prediccion.dia.flatMap((day) => parseForecastDay(day, timestamp));
}
