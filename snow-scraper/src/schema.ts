import { z } from "zod";

const NUMERIC_TEXT = /^\s*-?\d+(\.\d+)?\s*$/;

// Snow amounts in inches. The model sometimes answers "12" or 3.6; both are accepted and rounded.
const inches = z
  .union([z.number(), z.string().regex(NUMERIC_TEXT).transform(Number), z.null()])
  .optional()
  .transform((v) => (v == null ? null : Math.round(v)));

const text = z
  .union([z.string(), z.number().transform(String), z.null()])
  .optional()
  .transform((v) => v ?? null);

const resortName = z
  .union([z.string(), z.null()])
  .optional()
  .transform((v) => {
    const name = v?.trim();
    return name ? name : null;
  });

/**
 * Shape of one resort's snow report. Keys are the column names of the report table.
 */
export const SnowReportSchema = z.object({
  "Ski Resort": resortName,
  "Snowfall 6 days ago": inches,
  "Snowfall 5 days ago": inches,
  "Snowfall 4 days ago": inches,
  "Snowfall 3 days ago": inches,
  "Snowfall 2 days ago": inches,
  "Snowfall 1 day ago": inches,
  "Snowfall forecasted today": inches,
  "Snowfall forecasted in 1 day": inches,
  "Snowfall forecasted in 2 days": inches,
  "Snowfall forecasted in 3 days": inches,
  "Snowfall forecasted in 4 days": inches,
  "Snowfall forecasted in 5 days": inches,
  "Mid Mountain Snow": inches,
  "Lifts Open": text,
  "Runs Open": text,
});

export type SnowReport = z.output<typeof SnowReportSchema>;
export type SnowReportField = keyof SnowReport;

export const RESORT_FIELD = "Ski Resort" satisfies SnowReportField;

export const REPORT_FIELDS: readonly SnowReportField[] = SnowReportSchema.keyof().options;

export const FIELD_HINTS: Record<SnowReportField, { type: "text" | "integer"; hint: string }> = {
  "Ski Resort": { type: "text", hint: "resort name" },
  "Snowfall 6 days ago": { type: "integer", hint: "inches of new snow six days ago" },
  "Snowfall 5 days ago": { type: "integer", hint: "inches of new snow five days ago" },
  "Snowfall 4 days ago": { type: "integer", hint: "inches of new snow four days ago" },
  "Snowfall 3 days ago": { type: "integer", hint: "inches of new snow three days ago" },
  "Snowfall 2 days ago": { type: "integer", hint: "inches of new snow two days ago" },
  "Snowfall 1 day ago": { type: "integer", hint: "inches of new snow yesterday" },
  "Snowfall forecasted today": { type: "integer", hint: "forecast inches for today" },
  "Snowfall forecasted in 1 day": { type: "integer", hint: "forecast inches for tomorrow" },
  "Snowfall forecasted in 2 days": { type: "integer", hint: "forecast inches two days out" },
  "Snowfall forecasted in 3 days": { type: "integer", hint: "forecast inches three days out" },
  "Snowfall forecasted in 4 days": { type: "integer", hint: "forecast inches four days out" },
  "Snowfall forecasted in 5 days": { type: "integer", hint: "forecast inches five days out" },
  "Mid Mountain Snow": { type: "integer", hint: "mid mountain snow depth in inches" },
  "Lifts Open": { type: "text", hint: 'lifts open as written on the page, e.g. "5/8 Lifts Open"' },
  "Runs Open": { type: "text", hint: 'runs open as written on the page, e.g. "20/35 Runs Open"' },
};
