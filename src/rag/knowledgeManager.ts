import { mkdirSync } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { isErrnoException } from "../errors.js";
import { formatErrorMessage, loggerFor, type PrefixedLogger } from "../logger.js";
import { csvRecords } from "./csv.js";
import { bodyText, cleanText, extractTitle, htmlToText, selectAll, selectFirst, stripNonContent } from "./htmlText.js";
import type { PageFetcher } from "./pageFetcher.js";
import {
  KNOWLEDGE_COLUMNS,
  emptyKnowledge,
  type CsvValidation,
  type ExtractedPage,
  type KnowledgeColumn,
  type KnowledgeRow,
  type KnowledgeSource,
  type ProcessedKnowledge,
} from "./types.js";

const WIKI_SELECTORS = [
  "div.mw-content-ltr",
  "div.content",
  "div.main-content",
  "article",
  "div#content",
  "div#mw-content-text",
] as const;

const FORUM_SELECTORS = [
  "div.post-content",
  "div.entry-content",
  "div.content",
  "div.post",
  "article",
  'div[class*="post"]',
  'div[class*="content"]',
] as const;

const MIN_CONTENT_LENGTH = 50;

type CsvReadResult =
  | { status: "missing" }
  | { status: "invalid"; missingColumns: KnowledgeColumn[] }
  | { status: "ok"; rows: KnowledgeRow[] };

export interface KnowledgeManagerOptions {
  gamesInfoDir: string;
  fetcher: PageFetcher;
  logger?: PrefixedLogger;
}

/** Reads per-game knowledge CSVs and pulls the text of the pages they list. */
export class KnowledgeManager implements KnowledgeSource {
  readonly gamesInfoDir: string;
  private readonly fetcher: PageFetcher;
  private readonly log: PrefixedLogger;

  constructor(options: KnowledgeManagerOptions) {
    this.gamesInfoDir = options.gamesInfoDir;
    this.fetcher = options.fetcher;
    this.log = options.logger ?? loggerFor("knowledge");
    mkdirSync(this.gamesInfoDir, { recursive: true });
  }

  async getAvailableGames(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.gamesInfoDir);
      return entries
        .filter((name) => name.endsWith(".csv"))
        .map((name) => name.slice(0, -".csv".length))
        .sort();
    } catch (error) {
      this.log.warn(`list games dir=${this.gamesInfoDir} error=${formatErrorMessage(error)}`);
      return [];
    }
  }

  async loadGameCsv(game: string): Promise<KnowledgeRow[] | null> {
    const result = await this.readGameCsv(game);
    switch (result.status) {
      case "ok":
        return result.rows;
      case "invalid":
        this.log.warn(`csv game=${game} missing columns: ${result.missingColumns.join(", ")}`);
        return null;
      case "missing":
        return null;
    }
  }

  async validateCsvStructure(game: string): Promise<CsvValidation> {
    const result = await this.readGameCsv(game);
    if (result.status === "missing") {
      return { valid: false, errors: ["CSV file not found"] };
    }
    if (result.status === "invalid") {
      return { valid: false, errors: [`Missing columns: ${result.missingColumns.join(", ")}`] };
    }
    const emptyRows = result.rows.filter((row) => KNOWLEDGE_COLUMNS.every((column) => row[column] === null)).length;
    if (emptyRows > 0) {
      return { valid: false, errors: [`Found ${emptyRows} completely empty rows`] };
    }
    return { valid: true, errors: [] };
  }

  async extractWikiContent(url: string | null | undefined): Promise<ExtractedPage | null> {
    return this.extractPage(url, "wiki", (html) => {
      for (const selector of WIKI_SELECTORS) {
        const element = selectFirst(html, selector);
        if (element !== null) {
          return htmlToText(element);
        }
      }
      return "";
    });
  }

  async extractForumContent(url: string | null | undefined): Promise<ExtractedPage | null> {
    return this.extractPage(url, "forum", (html) => {
      for (const selector of FORUM_SELECTORS) {
        const elements = selectAll(html, selector);
        if (elements.length > 0) {
          return elements.map(htmlToText).join(" ");
        }
      }
      return "";
    });
  }

  async processGameKnowledge(game: string): Promise<ProcessedKnowledge> {
    const rows = await this.loadGameCsv(game);
    const knowledge = emptyKnowledge();
    if (!rows) {
      return knowledge;
    }

    this.log.info(`processing game=${game} rows=${rows.length}`);

    for (const row of rows) {
      if (!row.wiki) continue;
      const page = await this.extractWikiContent(row.wiki);
      if (page) {
        knowledge.wiki.push({ url: row.wiki, description: row.wiki_desc ?? "", title: page.title, content: page.content });
      }
    }

    for (const row of rows) {
      if (!row.youtube) continue;
      knowledge.youtube.push({
        url: row.youtube,
        description: row.yt_desc ?? "",
        title: `YouTube Video: ${row.yt_desc ?? "Unknown"}`,
      });
    }

    for (const row of rows) {
      if (!row.forum) continue;
      const page = await this.extractForumContent(row.forum);
      if (page) {
        knowledge.forum.push({ url: row.forum, description: row.forum_desc ?? "", title: page.title, content: page.content });
      }
    }

    this.log.info(
      `processed game=${game} wiki=${knowledge.wiki.length} youtube=${knowledge.youtube.length} forum=${knowledge.forum.length}`,
    );
    return knowledge;
  }

  private csvPath(game: string): string {
    return path.join(this.gamesInfoDir, `${game}.csv`);
  }

  private async readGameCsv(game: string): Promise<CsvReadResult> {
    let text: string;
    try {
      text = await fs.readFile(this.csvPath(game), "utf-8");
    } catch (error) {
      if (!(isErrnoException(error) && error.code === "ENOENT")) {
        this.log.warn(`csv game=${game} error=${formatErrorMessage(error)}`);
      }
      return { status: "missing" };
    }

    const { header, records } = csvRecords(text);
    const missingColumns = KNOWLEDGE_COLUMNS.filter((column) => !header.includes(column));
    if (missingColumns.length > 0) {
      return { status: "invalid", missingColumns };
    }

    const rows = records.map((record) => {
      const row: KnowledgeRow = {
        wiki: null,
        wiki_desc: null,
        youtube: null,
        yt_desc: null,
        forum: null,
        forum_desc: null,
      };
      for (const column of KNOWLEDGE_COLUMNS) {
        const value = (record[column] ?? "").trim();
        row[column] = value.length > 0 ? value : null;
      }
      return row;
    });
    return { status: "ok", rows };
  }

  private async extractPage(
    url: string | null | undefined,
    kind: "wiki" | "forum",
    selectContent: (html: string) => string,
  ): Promise<ExtractedPage | null> {
    if (typeof url !== "string" || !url.trim()) {
      return null;
    }

    let html: string;
    try {
      html = stripNonContent(await this.fetcher.fetchHtml(url));
    } catch (error) {
      this.log.warn(`extract ${kind} url=${url} error=${formatErrorMessage(error)}`);
      return null;
    }

    const title = extractTitle(html);
    const content = cleanText(selectContent(html) || bodyText(html));

    if (content.length < MIN_CONTENT_LENGTH) {
      this.log.debug(`extract ${kind} url=${url} skipped: ${content.length} chars`);
      return null;
    }

    return { title, content, url };
  }
}
