import { load } from "cheerio";
import { normalizeCourtName } from "../documents";
import type { CaseParties, RowMetadata, SourceTab } from "../types";

/*
 * Every selector the crawler depends on lives in this file, one adapter per
 * view. A markup change on the archive should only ever touch this module.
 */

const ZERO_GUID = "00000000-0000-0000-0000-000000000000";

export interface ParseContext {
  baseUrl: string;
  attachmentMarker: string;
}

export interface ParsedRow {
  url: string;
  metadata: Partial<RowMetadata>;
}

export interface Suggestion {
  caseGuid: string;
  caseNumber: string;
  text: string;
}

export interface ParsedCard {
  caseGuid: string | null;
  caseNumber: string | null;
  status: string | null;
  parties: CaseParties;
}

export interface ParsedInstanceHeader {
  instanceId: string | null;
  instanceType: string;
  courtName: string | null;
  courtCode: string | null;
  regDate: string | null;
  caseNumber: string | null;
  expandable: boolean;
  rows: ParsedRow[];
}

function cleanText(value: string | undefined | null): string | null {
  if (!value) {
    return null;
  }
  const collapsed = value.replace(/\s+/g, " ").trim();
  return collapsed.length > 0 ? collapsed : null;
}

function absoluteUrl(href: string, baseUrl: string): string {
  return new URL(href, baseUrl).toString();
}

function linkSelector(ctx: ParseContext, scope = "a"): string {
  return `${scope}[href*='${ctx.attachmentMarker}']`;
}

const JUDGE_PATTERN = /Судья[^:]*:\s*<\/strong>\s*<br[^>]*>\s*([^<]+)/i;

/** Attachment links in `html`, with whatever row metadata surrounds them. */
function parseAttachmentLinks(html: string, selector: string, ctx: ParseContext): ParsedRow[] {
  const $ = load(html);
  const rows: ParsedRow[] = [];

  $(selector).each((_, element) => {
    const link = $(element);
    const href = link.attr("href");
    if (!href || !href.includes(ctx.attachmentMarker)) {
      return;
    }

    const parent = link.parent();
    const signature = parent.find(".g-valid_sign");
    const judgeHtml = parent.find(".js-judges-rolloverHtml").first().html() ?? "";
    const judgeMatch = judgeHtml.match(JUDGE_PATTERN);
    const signersText = parent.find(".js-signers-rolloverHtml").first().text();
    const courtLine = signersText
      .split("\n")
      .map((line) => line.trim())
      .find((line) => line.length > 0);

    rows.push({
      url: absoluteUrl(href, ctx.baseUrl),
      metadata: {
        title: cleanText(link.find(".js-judges-rollover").first().text()) ?? cleanText(link.text()),
        judge: judgeMatch ? cleanText(judgeMatch[1]) : null,
        court: courtLine ? normalizeCourtName(courtLine) : null,
        signed: signature.length > 0,
        signatureValid: signature.text().includes("Подписано"),
      },
    });
  });

  return rows;
}

/** Highest `data-page_num` among all pager items; 1 when absent, zero or unparsable. */
export function parseMaxPage(html: string, pagerItemSelector: string): number {
  const $ = load(html);
  let maxPage = 1;
  $(pagerItemSelector).each((_, element) => {
    const parsed = Number.parseInt($(element).attr("data-page_num") ?? "", 10);
    if (Number.isFinite(parsed) && parsed > maxPage) {
      maxPage = parsed;
    }
  });
  return maxPage;
}

export const SEARCH_FORM = {
  readySelector: "#sug-cases",
  inputSelector: "#sug-cases input",
  suggestionItemSelector: "#b-suggest li a, .b-suggest li a",
  suggestionListSelector: "#b-suggest, .b-suggest",
  promoCloseSelector: "a.js-promo_notification-popup-close",
  captchaSelector: ".b-pravocaptcha-modal_wrapper:not(:empty), .g-recaptcha",

  parseSuggestions(html: string): Suggestion[] {
    const $ = load(html);
    const suggestions: Suggestion[] = [];
    $("li a").each((_, element) => {
      const link = $(element);
      const caseGuid = link.attr("id")?.trim();
      const text = cleanText(link.text());
      if (!caseGuid || caseGuid === ZERO_GUID || !text) {
        return;
      }
      const caseNumber = cleanText(link.find(".num").first().text()) ?? text.split(" ")[0];
      suggestions.push({ caseGuid, caseNumber, text });
    });
    return suggestions;
  },
};

export const CASE_CARD = {
  readySelector: "div.b-chrono-item-header.js-chrono-item-header, #chrono_list_content",

  cardUrl(baseUrl: string, caseGuid: string): string {
    return absoluteUrl(`Card/${encodeURIComponent(caseGuid)}`, baseUrl);
  },

  parseCard(html: string): ParsedCard {
    const $ = load(html);
    const partyList = (selector: string): string[] =>
      $(selector)
        .map((_, element) => cleanText($(element).text()))
        .get();

    return {
      caseGuid: cleanText($("input#caseId").attr("value")),
      caseNumber: cleanText($("input#caseName").attr("value")),
      status: cleanText($("div.b-case-header-desc").first().text()),
      parties: {
        plaintiffs: partyList("#gr_case_partps td.plaintiffs li"),
        defendants: partyList("#gr_case_partps td.defendants li"),
        thirdParties: partyList("#gr_case_partps td.third li"),
      },
    };
  },
};

export interface FlatTabAdapter {
  tab: SourceTab;
  buttonSelector: string;
  /** When false the tab may render without its button being clicked. */
  buttonRequired: boolean;
  readySelector: string;
  containerSelector: string;
  paginated: boolean;
  pagerItemSelector: string;
  pageButtonSelector(page: number): string;
  parseRows(html: string, ctx: ParseContext): ParsedRow[];
}

export const COURT_ACTS_TAB: FlatTabAdapter = {
  tab: "court_acts",
  buttonSelector: "#case_acts",
  buttonRequired: false,
  readySelector: "#gr_case_acts",
  containerSelector: "#gr_case_acts",
  paginated: false,
  pagerItemSelector: ".js-chrono-pagination-pager-item[data-page_num]",
  pageButtonSelector: (page) => `#gr_case_acts .js-chrono-pagination-pager-item[data-page_num='${page}']`,
  parseRows: (html, ctx) => parseAttachmentLinks(html, linkSelector(ctx), ctx),
};

export const ELECTRONIC_CASE_TAB: FlatTabAdapter = {
  tab: "electronic_case",
  buttonSelector: "div.js-case-chrono-button--ed",
  buttonRequired: true,
  readySelector: "#chrono_ed_content:not(.g-hidden)",
  containerSelector: "#chrono_ed_content",
  paginated: true,
  pagerItemSelector: ".js-chrono-pagination-pager-item[data-page_num]",
  pageButtonSelector: (page) => `#chrono_ed_content .js-chrono-pagination-pager-item[data-page_num='${page}']`,
  parseRows: (html, ctx) => parseAttachmentLinks(html, linkSelector(ctx, "a.b-case-chrono-ed-item-link"), ctx),
};

const INSTANCE_HEADER = ".b-chrono-item-header.js-chrono-item-header";
const INSTANCE_ITEMS = ".b-chrono-items-container.js-chrono-items-container";

export const CARDS_TAB = {
  tab: "cards" as const,
  buttonSelector: "div.js-case-chrono-button--cards",
  readySelector: "#chrono_list_content:not(.g-hidden)",
  containerSelector: "#chrono_list_content",
  pagerItemSelector: ".js-chrono-pagination-pager-item[data-page_num]",

  collapseSelector: (index: number) => `#chrono_list_content ${INSTANCE_HEADER} >> nth=${index} >> .b-collapse.js-collapse`,
  itemsSelector: (index: number) => `#chrono_list_content ${INSTANCE_ITEMS} >> nth=${index}`,
  pageButtonSelector: (index: number, page: number) =>
    `#chrono_list_content ${INSTANCE_ITEMS} >> nth=${index} >> .js-chrono-pagination-pager-item[data-page_num='${page}']`,

  parseInstanceHeaders(html: string, ctx: ParseContext): ParsedInstanceHeader[] {
    const $ = load(html);
    const headers: ParsedInstanceHeader[] = [];
    $(INSTANCE_HEADER).each((_, element) => {
      const header = $(element);
      const court = header.find(".instantion-name").first();
      headers.push({
        instanceId: cleanText(header.attr("data-id")),
        instanceType: cleanText(header.find("div.l-col strong").first().text()) ?? "Unknown",
        courtName: cleanText(court.text()),
        courtCode: cleanText(court.find("[data-court]").first().attr("data-court") ?? court.attr("data-court")),
        regDate: cleanText(header.find(".b-reg-date").first().text()),
        caseNumber: cleanText(header.find(".b-case-instance-number").first().text()),
        expandable: header.find(".b-collapse.js-collapse").length > 0,
        rows: parseAttachmentLinks($.html(header), linkSelector(ctx), ctx),
      });
    });
    return headers;
  },

  parseItems(html: string, ctx: ParseContext): ParsedRow[] {
    return parseAttachmentLinks(html, linkSelector(ctx), ctx);
  },
};
