import { XMLParser } from 'fast-xml-parser';
import { ProtocolError } from './errors';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseTagValue: true,
  trimValues: true,
});

export type DocNode = string | number | boolean | null | DocNode[] | { [key: string]: DocNode };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toDocNode(value: unknown): DocNode {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.map(toDocNode);
  if (isRecord(value)) {
    const out: { [key: string]: DocNode } = {};
    for (const [k, v] of Object.entries(value)) out[k] = toDocNode(v);
    return out;
  }
  return String(value);
}

/**
 * Device web services answer in XML or JSON depending on firmware. Both are
 * parsed into the same tree; attributes become plain keys.
 */
export function parseDocument(text: string): DocNode {
  const trimmed = text.trim();
  if (!trimmed) return null;
  try {
    if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
      return toDocNode(JSON.parse(trimmed));
    }
    if (trimmed.startsWith('<')) {
      return toDocNode(parser.parse(trimmed));
    }
  } catch (error) {
    throw new ProtocolError(`Unparseable device response: ${error instanceof Error ? error.message : String(error)}`);
  }
  return trimmed;
}

/** First scalar found under any of `keys` (case-insensitive), depth-first. */
export function findValue(node: DocNode, keys: readonly string[]): string | undefined {
  const wanted = keys.map((k) => k.toLowerCase());
  const visit = (current: DocNode): string | undefined => {
    if (Array.isArray(current)) {
      for (const item of current) {
        const found = visit(item);
        if (found !== undefined) return found;
      }
      return undefined;
    }
    if (current === null || typeof current !== 'object') return undefined;
    for (const [k, v] of Object.entries(current)) {
      if (wanted.includes(k.toLowerCase()) && v !== null && typeof v !== 'object') {
        return String(v);
      }
    }
    for (const v of Object.values(current)) {
      const found = visit(v);
      if (found !== undefined) return found;
    }
    return undefined;
  };
  return visit(node);
}

/** Every object in the tree that carries `key`, flattening XML's single-vs-list ambiguity. */
export function findRecords(node: DocNode, key: string): Array<{ [key: string]: DocNode }> {
  const wanted = key.toLowerCase();
  const results: Array<{ [key: string]: DocNode }> = [];
  const visit = (current: DocNode): void => {
    if (Array.isArray(current)) {
      current.forEach(visit);
      return;
    }
    if (current === null || typeof current !== 'object') return;
    if (Object.keys(current).some((k) => k.toLowerCase() === wanted)) {
      results.push(current);
    }
    Object.values(current).forEach(visit);
  };
  visit(node);
  return results;
}
