import { load } from "cheerio";
import { collapseWhitespace } from "./utils";

// Report body of an OnTheSnow resort page.
export const REPORT_SELECTOR =
  "#__next > div.container-xl.content-container > div.styles_layout__Zkjid.layout-container > div > div.skireport_reportContent__Gmrl5";

/**
 * Returns the visible text of the report region, or the markup untouched when
 * the page has no such region.
 */
export function selectReportContent(html: string, selector: string = REPORT_SELECTOR): string {
  const $ = load(html);
  const region = $(selector).first();
  if (region.length === 0) return html;

  region.find("script, style, noscript").remove();
  // keep adjacent cells like <td>8"</td><td>12"</td> from running together
  region.find("*").each((_, el) => {
    $(el).prepend(" ").append(" ");
  });

  return collapseWhitespace(region.text());
}
