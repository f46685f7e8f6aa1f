/**
 * Network tools - HTTP requests, page fetching and web search.
 *
 * Every request is bounded by the configured HTTP timeout and aborted with
 * the call. Response bodies are cut at `maxBodyChars`.
 */

import TurndownService from "turndown";
import { z } from "zod";
import { defineTool, optional, required } from "../define.ts";
import { ToolCategory } from "../types.ts";
import type { ToolContext, ToolDescriptor } from "../types.ts";
import { MissingConfigurationError, ToolValidationError } from "../errors.ts";
import type { HttpConfig, WebSearchConfig } from "../../infra/config-schema.ts";
import { ArgReader } from "./args.ts";
import { getLogger } from "../../infra/logger.ts";

const logger = getLogger("tools.network");

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE", "PATCH", "HEAD", "OPTIONS"];

// ── Shared request plumbing ─────────────────────

/**
 * A signal that fires when the call is aborted or after `timeoutMs`.
 */
function requestSignal(callSignal: AbortSignal, timeoutMs: number): { signal: AbortSignal; done: () => void } {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(callSignal.reason);
  if (callSignal.aborted) {
    onAbort();
  } else {
    callSignal.addEventListener("abort", onAbort, { once: true });
  }
  const timer = setTimeout(() => {
    controller.abort(new Error(`HTTP request timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  return {
    signal: controller.signal,
    done: () => {
      clearTimeout(timer);
      callSignal.removeEventListener("abort", onAbort);
    },
  };
}

function parseUrl(toolName: string, raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ToolValidationError(toolName, `'url' is not a valid URL: ${raw}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ToolValidationError(toolName, `'url' must use http or https, got ${url.protocol}`);
  }
  return url;
}

function stringHeaders(toolName: string, headers: Record<string, unknown> | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers ?? {})) {
    if (typeof value !== "string") {
      throw new ToolValidationError(toolName, `header '${key}' must be a string`);
    }
    result[key] = value;
  }
  return result;
}

function truncate(text: string, limit: number): { text: string; truncated: boolean } {
  return text.length > limit
    ? { text: text.slice(0, limit), truncated: true }
    : { text, truncated: false };
}

interface HttpRequest {
  method: string;
  url: URL;
  headers: Record<string, string>;
  body?: string;
}

async function sendRequest(
  request: HttpRequest,
  context: ToolContext,
  config: HttpConfig,
): Promise<Record<string, unknown>> {
  const { signal, done } = requestSignal(context.signal, config.timeout * 1000);
  try {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal,
    });

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });
    const body = truncate(await response.text(), config.maxBodyChars);

    logger.debug(
      { method: request.method, url: request.url.href, status: response.status },
      "http_request_done",
    );

    return {
      url: request.url.href,
      method: request.method,
      status: response.status,
      statusText: response.statusText,
      headers,
      body: body.text,
      truncated: body.truncated,
    };
  } finally {
    done();
  }
}

// ── web_fetch cache ─────────────────────────────

const WEB_FETCH_CACHE = new Map<string, { content: string; contentLength: number; expiresAt: number }>();
const CACHE_TTL_MS = 15 * 60 * 1000;
const MAX_CACHE_ENTRIES = 100;
const REDIRECT_STATUSES = [301, 302, 303, 307, 308];
const MAX_REDIRECTS = 5;

// Singleton TurndownService, reused across all web_fetch calls
const turndownService = new TurndownService({ headingStyle: "atx", codeBlockStyle: "fenced" });

export function clearWebFetchCache(): void {
  WEB_FETCH_CACHE.clear();
}

/**
 * Strip non-content tags, then convert HTML to Markdown.
 */
export function htmlToMarkdown(html: string): string {
  const cleaned = html
    .replace(/<script[\s\S]*?<\/script>/gi, "")
    .replace(/<style[\s\S]*?<\/style>/gi, "")
    .replace(/<nav[\s\S]*?<\/nav>/gi, "")
    .replace(/<footer[\s\S]*?<\/footer>/gi, "")
    .replace(/<header[\s\S]*?<\/header>/gi, "");
  return turndownService.turndown(cleaned);
}

// ── web_search response ─────────────────────────

const TavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z.array(
    z.object({
      title: z.string(),
      url: z.string(),
      content: z.string().default(""),
      score: z.number().optional(),
    }),
  ).default([]),
});

// ── Tools ───────────────────────────────────────

export function createNetworkTools(http: HttpConfig, webSearch: WebSearchConfig): ToolDescriptor[] {
  const http_get = defineTool({
    name: "http_get",
    description: "Make an HTTP GET request",
    category: ToolCategory.NETWORK,
    parameters: [
      required("url", "string", "URL to request"),
      optional("headers", "object", "Request headers"),
    ],
    handler(args, context) {
      const a = new ArgReader(args, context.toolName);
      return sendRequest({
        method: "GET",
        url: parseUrl(context.toolName, a.string("url")),
        headers: stringHeaders(context.toolName, a.optionalRecord("headers")),
      }, context, http);
    },
  });

  const http_post = defineTool({
    name: "http_post",
    description: "Make an HTTP POST request (JSON content type unless overridden)",
    category: ToolCategory.NETWORK,
    parameters: [
      required("url", "string", "URL to request"),
      optional("body", "string", "Request body"),
      optional("headers", "object", "Request headers"),
    ],
    handler(args, context) {
      const a = new ArgReader(args, context.toolName);
      return sendRequest({
        method: "POST",
        url: parseUrl(context.toolName, a.string("url")),
        headers: {
          "Content-Type": "application/json",
          ...stringHeaders(context.toolName, a.optionalRecord("headers")),
        },
        body: a.optionalString("body"),
      }, context, http);
    },
  });

  const http_request = defineTool({
    name: "http_request",
    description: "Make a generic HTTP request with any method",
    category: ToolCategory.NETWORK,
    parameters: [
      required("method", "string", "HTTP method", { enum: HTTP_METHODS }),
      required("url", "string", "URL to request"),
      optional("body", "string", "Request body"),
      optional("headers", "object", "Request headers"),
    ],
    handler(args, context) {
      const a = new ArgReader(args, context.toolName);
      const method = a.string("method");
      const body = a.optionalString("body");
      if (body !== undefined && (method === "GET" || method === "HEAD")) {
        throw new ToolValidationError(context.toolName, `${method} requests cannot have a body`);
      }
      return sendRequest({
        method,
        url: parseUrl(context.toolName, a.string("url")),
        headers: stringHeaders(context.toolName, a.optionalRecord("headers")),
        body,
      }, context, http);
    },
  });

  const web_fetch = defineTool({
    name: "web_fetch",
    description: "Fetch a web page and return its content as Markdown. "
      + "Cross-host redirects are reported instead of followed. Includes a 15-minute cache.",
    category: ToolCategory.NETWORK,
    parameters: [required("url", "string", "The URL to fetch content from")],
    async handler(args, context) {
      const rawUrl = new ArgReader(args, context.toolName).string("url");
      let url = parseUrl(context.toolName, rawUrl);

      const cacheKey = url.href;
      const cached = WEB_FETCH_CACHE.get(cacheKey);
      if (cached && cached.expiresAt > Date.now()) {
        return { url: rawUrl, content: cached.content, cached: true, contentLength: cached.contentLength };
      }

      // Upgrade http to https, except for local hosts
      if (url.protocol === "http:" && url.hostname !== "localhost" && url.hostname !== "127.0.0.1") {
        url = new URL(url.href.replace(/^http:/, "https:"));
      }

      const { signal, done } = requestSignal(context.signal, http.timeout * 1000);
      try {
        let current = url;
        let response = await fetch(current, { redirect: "manual", signal });

        // Same-host redirects are followed one hop at a time so every hop is checked
        for (let hops = 0; REDIRECT_STATUSES.includes(response.status); hops++) {
          const location = response.headers.get("location");
          if (!location) break;
          const redirectUrl = new URL(location, current);
          if (redirectUrl.hostname !== url.hostname) {
            return {
              redirected: true,
              originalUrl: rawUrl,
              redirectUrl: redirectUrl.href,
              notice: "URL redirected to a different host. Make a new web_fetch request with the redirect URL to fetch the content.",
            };
          }
          if (hops >= MAX_REDIRECTS) {
            throw new Error(`Too many redirects fetching ${rawUrl}`);
          }
          current = redirectUrl;
          response = await fetch(current, { redirect: "manual", signal });
        }

        if (!response.ok) {
          throw new Error(`HTTP ${response.status} ${response.statusText} fetching ${rawUrl}`);
        }

        const contentType = response.headers.get("content-type") ?? "";
        const rawBody = await response.text();
        let content = contentType.includes("text/html") ? htmlToMarkdown(rawBody) : rawBody;
        if (content.length > http.maxBodyChars) {
          content = content.slice(0, http.maxBodyChars)
            + `\n\n[Content truncated, original length: ${rawBody.length} chars]`;
        }

        if (WEB_FETCH_CACHE.size >= MAX_CACHE_ENTRIES) {
          // Map iterates in insertion order: the first key is the oldest
          const oldestKey = WEB_FETCH_CACHE.keys().next().value;
          if (oldestKey !== undefined) WEB_FETCH_CACHE.delete(oldestKey);
        }
        WEB_FETCH_CACHE.set(cacheKey, {
          content,
          contentLength: rawBody.length,
          expiresAt: Date.now() + CACHE_TTL_MS,
        });

        return { url: rawUrl, content, cached: false, contentLength: rawBody.length };
      } finally {
        done();
      }
    },
  });

  const web_search = defineTool({
    name: "web_search",
    description: "Search the web (requires TAVILY_API_KEY)",
    category: ToolCategory.NETWORK,
    parameters: [
      required("query", "string", "Search query"),
      optional("limit", "integer", `Maximum number of results (default ${webSearch.maxResults})`),
    ],
    async handler(args, context) {
      const a = new ArgReader(args, context.toolName);
      const query = a.string("query");
      const limit = a.positive("limit") ?? webSearch.maxResults;

      const apiKey = webSearch.apiKey || context.env["TAVILY_API_KEY"];
      if (!apiKey) {
        throw new MissingConfigurationError(
          context.toolName,
          "TAVILY_API_KEY",
          "set it in the environment or in tools.webSearch.apiKey",
        );
      }

      const { signal, done } = requestSignal(context.signal, http.timeout * 1000);
      try {
        const response = await fetch(webSearch.endpoint, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${apiKey}`,
          },
          body: JSON.stringify({ query, max_results: limit }),
          signal,
        });
        if (!response.ok) {
          throw new Error(`Search request failed: HTTP ${response.status} ${response.statusText}`);
        }

        const parsed = TavilyResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new Error(`Unexpected search response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
        }

        const results = parsed.data.results.slice(0, limit).map((r) => ({
          title: r.title,
          url: r.url,
          snippet: r.content,
        }));
        return { query, answer: parsed.data.answer ?? null, results, count: results.length };
      } finally {
        done();
      }
    },
  });

  return [http_get, http_post, http_request, web_fetch, web_search];
}
