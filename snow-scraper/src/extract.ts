import type { CompletionClient, CompletionRequest } from "./completion";
import { FIELD_HINTS, REPORT_FIELDS, SnowReportSchema, type SnowReport } from "./schema";
import { REPORT_SELECTOR, selectReportContent } from "./select";
import type { FetchedPage, ItemOutcome } from "./types";
import { errorMessage } from "./utils";

export const EXTRACTION_SYSTEM_PROMPT =
  "You extract ski resort conditions from web page text and answer with a single JSON object.";

export type ExtractOptions = {
  reportSelector?: string;
};

export type ParseResult = { ok: true; report: SnowReport } | { ok: false; message: string };

export type DispatchResult = { ok: true; outcomes: ItemOutcome[] } | { ok: false; error: string };

export function buildExtractionPrompt(content: string): string {
  const fieldList = REPORT_FIELDS.map((field, i) => `${i + 1}. "${field}" (${FIELD_HINTS[field].type}): ${FIELD_HINTS[field].hint}`);
  const shape = REPORT_FIELDS.map((field) => `  "${field}": ${FIELD_HINTS[field].type === "text" ? '"text"' : "integer"}`);

  return [
    "Read the ski resort report below and fill in these fields:",
    ...fieldList,
    "",
    "Rules:",
    "- Use null for any value the report does not state.",
    "- Snowfall and snow depth are integers in inches; convert written numbers to digits and round fractions.",
    '- Keep lifts and runs open as the text shown on the page (for example "5/8 Lifts Open").',
    "",
    "Answer with a JSON object that has exactly these keys:",
    "{",
    shape.join(",\n"),
    "}",
    "",
    `Content: ${content}`,
  ].join("\n");
}

export function parseSnowReport(body: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    return { ok: false, message: `response is not JSON: ${errorMessage(err)}` };
  }

  const parsed = SnowReportSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    return { ok: false, message: `response does not match the report shape: ${issues.join("; ")}` };
  }
  return { ok: true, report: parsed.data };
}

/**
 * Sends one completion per page, all at once, and waits for every answer.
 * Per-item faults become failure outcomes; a fault while preparing the requests
 * is returned as an error so the caller decides what the whole sub-batch becomes.
 */
export async function dispatchSubBatch(
  pages: FetchedPage[],
  client: CompletionClient,
  options: ExtractOptions = {}
): Promise<DispatchResult> {
  let requests: CompletionRequest[];
  try {
    requests = pages.map(({ html }) => ({
      system: EXTRACTION_SYSTEM_PROMPT,
      user: buildExtractionPrompt(selectReportContent(html, options.reportSelector ?? REPORT_SELECTOR)),
    }));
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }

  const settled = await Promise.allSettled(requests.map(async (request) => client.complete(request)));

  const outcomes = settled.map((res, i): ItemOutcome => {
    const { url } = pages[i];
    if (res.status === "rejected") {
      return { ok: false, url, failure: { kind: "extraction-dispatch", url, message: errorMessage(res.reason) } };
    }
    const parsed = parseSnowReport(res.value);
    if (!parsed.ok) {
      return { ok: false, url, failure: { kind: "extraction-parse", url, message: parsed.message } };
    }
    return { ok: true, url, report: parsed.report };
  });

  return { ok: true, outcomes };
}

/** One outcome per page, same order, never rejects. */
export async function extractSubBatch(
  pages: FetchedPage[],
  client: CompletionClient,
  options: ExtractOptions = {}
): Promise<ItemOutcome[]> {
  const dispatched = await dispatchSubBatch(pages, client, options);
  if (dispatched.ok) return dispatched.outcomes;

  return pages.map(({ url }): ItemOutcome => ({
    ok: false,
    url,
    failure: { kind: "extraction-dispatch", url, message: `sub-batch dispatch failed: ${dispatched.error}` },
  }));
}
