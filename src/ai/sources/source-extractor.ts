/**
 * Citation extraction and merging.
 *
 * Each tool normalizes its raw provider output into citations once, when
 * the tool runs. `collectSources` later merges those per-call citations
 * into the deduplicated, capped list returned with an answer.
 */
import { AgentConfig } from '../../config/agent-config';
import { Source, ToolResult } from '../types/conversation';
import { TOOL_NAMES } from '../tools/tool-schemas';

export type SourceCaps = AgentConfig['sources'];

const URL_PATTERN = /https?:\/\/[^\s)"'<>\]]+/g;
const HTTP_URL = /^https?:\/\/\S+$/i;
const URL_KEYS = ['url', 'source', 'link', 'path'] as const;
const NAME_KEYS = ['title', 'name', 'file_name', 'filename'] as const;
const MAX_DEPTH = 8;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstString(
  record: Record<string, unknown>,
  keys: readonly string[],
): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Ordered, url-deduplicated citation list with a size limit.
 */
class CitationList {
  private readonly seen = new Set<string>();
  readonly items: Source[] = [];

  constructor(private readonly limit: number) {}

  get full(): boolean {
    return this.items.length >= this.limit;
  }

  add(name: string, url: string): void {
    if (this.full || !url || this.seen.has(url)) {
      return;
    }
    this.seen.add(url);
    this.items.push({ name: name || url, url });
  }
}

/**
 * Parse citations out of the internet search summary text: the
 * `Source: <url>` line and `- <title> (<url>)` related-topic bullets.
 * Lines of any other shape are ignored.
 */
export function parseSearchCitations(text: string): Source[] {
  const list = new CitationList(Number.POSITIVE_INFINITY);

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();

    if (/^source:/i.test(line)) {
      const url = line.slice(line.indexOf(':') + 1).trim();
      if (HTTP_URL.test(url)) {
        list.add(url, url);
      }
      continue;
    }

    if (line.startsWith('- ') && line.endsWith(')')) {
      const open = line.lastIndexOf(' (');
      if (open < 0) {
        continue;
      }
      const url = line.slice(open + 2, -1).trim();
      if (HTTP_URL.test(url)) {
        list.add(line.slice(2, open).trim(), url);
      }
    }
  }

  return list.items;
}

function parseJson(text: string): { value: unknown } | undefined {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
    return undefined;
  }
  try {
    return { value: JSON.parse(trimmed) };
  } catch {
    return undefined;
  }
}

function addFromFields(
  record: Record<string, unknown>,
  list: CitationList,
): boolean {
  const url = firstString(record, URL_KEYS);
  if (!url) {
    return false;
  }
  list.add(firstString(record, NAME_KEYS) ?? url, url);
  return true;
}

function walk(
  value: unknown,
  list: CitationList,
  depth: number,
  visited: WeakSet<object>,
): void {
  if (list.full || depth > MAX_DEPTH) {
    return;
  }

  if (typeof value === 'string') {
    const parsed = parseJson(value);
    if (parsed) {
      walk(parsed.value, list, depth + 1, visited);
      return;
    }
    for (const match of value.matchAll(URL_PATTERN)) {
      const url = match[0].replace(/[.,;:]+$/, '');
      list.add(url, url);
    }
    return;
  }

  if (typeof value !== 'object' || value === null || visited.has(value)) {
    return;
  }
  visited.add(value);

  if (Array.isArray(value)) {
    for (const item of value) {
      walk(item, list, depth + 1, visited);
    }
    return;
  }

  if (!isRecord(value) || addFromFields(value, list)) {
    return;
  }
  const metadata = value.metadata;
  if (isRecord(metadata) && addFromFields(metadata, list)) {
    return;
  }
  for (const nested of Object.values(value)) {
    walk(nested, list, depth + 1, visited);
  }
}

/**
 * Extract citations from a raw retrieval payload of any shape: strings
 * (JSON text or free text with URLs), arrays, plain records with
 * url/source/link/path fields, and documents carrying them in `metadata`.
 * Never yields more than `limit` entries.
 */
export function extractRetrievalCitations(
  raw: unknown,
  limit: number,
): Source[] {
  const list = new CitationList(limit);
  if (limit > 0) {
    walk(raw, list, 0, new WeakSet());
  }
  return list.items;
}

function capFor(toolName: string, caps: SourceCaps): number {
  switch (toolName) {
    case TOOL_NAMES.SEARCH:
      return caps.searchCap;
    case TOOL_NAMES.RETRIEVAL:
      return caps.retrievalCap;
    default:
      return 0;
  }
}

/**
 * Merge the citations of a request's tool results in dispatch order.
 *
 * Each tool kind contributes at most its own cap; the merged list is
 * deduplicated by url (first occurrence wins) and truncated to
 * `maxSources`. The weather tool never contributes.
 */
export function collectSources(
  results: readonly ToolResult[],
  caps: SourceCaps,
): Source[] {
  const merged = new CitationList(caps.maxSources);
  const contributed = new Map<string, number>();

  for (const result of results) {
    const cap = capFor(result.toolName, caps);
    for (const citation of result.citations) {
      const used = contributed.get(result.toolName) ?? 0;
      if (used >= cap || merged.full) {
        break;
      }
      const before = merged.items.length;
      merged.add(citation.name, citation.url);
      if (merged.items.length > before) {
        contributed.set(result.toolName, used + 1);
      }
    }
  }

  return merged.items;
}
