/**
 * PubMed retrieval through the NCBI E-utilities: esearch resolves a query to
 * PMIDs, esummary fetches the citation metadata for them.
 *
 * API documentation: https://www.ncbi.nlm.nih.gov/books/NBK25501/
 */

import { z } from "zod";
import type { RetrievalConfig } from "../config.js";
import { CollaboratorError, errorMessage, isRetryableStatus, isTransientNetworkError } from "../errors.js";
import { log } from "../logger.js";
import type { Evidence } from "../schema/clinical.js";
import type { RetrievalQuery, RetrievalService } from "./types.js";

const EUTILS_BASE = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";
const TOOL_NAME = "mcp-clinical-workflow";

const esearchSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()).default([]),
  }),
});

const summarySchema = z.object({
  title: z.string().default(""),
  fulljournalname: z.string().optional(),
  source: z.string().optional(),
  pubdate: z.string().optional(),
  authors: z.array(z.object({ name: z.string() })).default([]),
});

const esummarySchema = z.object({
  result: z
    .object({
      uids: z.array(z.string()).default([]),
    })
    .catchall(z.unknown()),
});

function publicationYear(pubdate: string | undefined): number | undefined {
  const match = pubdate?.match(/\b(\d{4})\b/);
  return match ? Number(match[1]) : undefined;
}

export class PubMedRetrievalService implements RetrievalService {
  private readonly baseUrl: string;

  constructor(
    private readonly config: RetrievalConfig,
    baseUrl: string = EUTILS_BASE,
  ) {
    this.baseUrl = baseUrl;
  }

  async search(query: RetrievalQuery): Promise<Evidence[]> {
    const limit = Math.min(query.limit ?? this.config.maxResults, this.config.maxResults);
    const search = esearchSchema.safeParse(
      await this.request("esearch.fcgi", { db: "pubmed", term: query.text, retmax: String(limit), sort: "relevance" }),
    );
    if (!search.success) {
      throw new CollaboratorError("pubmed", "esearch returned an unexpected payload", { retryable: true });
    }

    const ids = search.data.esearchresult.idlist.slice(0, limit);
    if (ids.length === 0) {
      log({ level: "debug", component: "pubmed", message: "No PubMed results", meta: { query: query.text } });
      return [];
    }

    const summary = esummarySchema.safeParse(
      await this.request("esummary.fcgi", { db: "pubmed", id: ids.join(",") }),
    );
    if (!summary.success) {
      throw new CollaboratorError("pubmed", "esummary returned an unexpected payload", { retryable: true });
    }

    const evidence: Evidence[] = [];
    for (const uid of summary.data.result.uids) {
      const record = summarySchema.safeParse(summary.data.result[uid]);
      if (!record.success || record.data.title.length === 0) {
        continue;
      }
      const { title, fulljournalname, source, pubdate, authors } = record.data;
      const entry: Evidence = {
        id: `pmid:${uid}`,
        title,
        url: `https://pubmed.ncbi.nlm.nih.gov/${uid}/`,
      };
      const journal = fulljournalname ?? source;
      if (journal) entry.journal = journal;
      const year = publicationYear(pubdate);
      if (year !== undefined) entry.year = year;
      if (authors.length > 0) entry.authors = authors.slice(0, 3).map((author) => author.name);
      evidence.push(entry);
    }
    return evidence;
  }

  private async request(endpoint: string, params: Record<string, string>): Promise<unknown> {
    const search = new URLSearchParams({ ...params, retmode: "json", tool: TOOL_NAME });
    if (this.config.apiKey) search.set("api_key", this.config.apiKey);
    if (this.config.email) search.set("email", this.config.email);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/${endpoint}?${search}`, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new CollaboratorError("pubmed", `${endpoint} request failed: ${errorMessage(error)}`, {
        retryable: isTransientNetworkError(error),
        cause: error,
      });
    }

    if (!response.ok) {
      throw new CollaboratorError("pubmed", `${endpoint} returned ${response.status}`, {
        retryable: isRetryableStatus(response.status),
        status: response.status,
      });
    }

    try {
      return await response.json();
    } catch (error) {
      throw new CollaboratorError("pubmed", `${endpoint} returned malformed JSON`, { retryable: true, cause: error });
    }
  }
}
