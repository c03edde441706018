/**
 * Portal Response Parsers
 * Turns layout and playback responses into equipment maps and energy samples
 */
import { FetchError } from './errors';
import type { EnergyData, EquipmentData, EquipmentMap } from './types';

const MONTHS: Record<string, number> = {
  Jan: 0, Feb: 1, Mar: 2, Apr: 3, May: 4, Jun: 5,
  Jul: 6, Aug: 7, Sep: 8, Oct: 9, Nov: 10, Dec: 11,
};

// e.g. "Mon Jan 02 15:04:05 GMT 2006"
const REPORTER_TIMESTAMP = /^(?:Sun|Mon|Tue|Wed|Thu|Fri|Sat) ([A-Z][a-z]{2}) (\d{1,2}) (\d{2}):(\d{2}):(\d{2}) GMT (\d{4})$/;

const IDENTIFIER_START = /[A-Za-z_$]/;
const IDENTIFIER_PART = /[\w$]/;
const WHITESPACE = /\s/;
const INTEGER = /^[-+]?\d+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toLayoutNode(
  value: unknown,
  path: string,
): { data: EquipmentData; children: unknown[] } {
  if (!isRecord(value)) {
    throw new FetchError(`Layout node ${path} is not an object`);
  }
  const { data, children } = value;
  if (!isRecord(data)) {
    throw new FetchError(`Layout node ${path} has no data`);
  }
  const { id } = data;
  if (typeof id !== 'number' || !Number.isSafeInteger(id)) {
    throw new FetchError(`Layout node ${path} has no integer id`);
  }
  if (!Array.isArray(children)) {
    throw new FetchError(`Layout node ${path} has no children list`);
  }
  return { data: { ...data, id }, children };
}

/**
 * Flatten the logical layout tree into a map of equipment ID to equipment data.
 * Nodes are visited in document pre-order; a repeated ID keeps the last node.
 */
export function flattenEquipmentTree(layout: unknown): EquipmentMap {
  if (!isRecord(layout) || !isRecord(layout.logicalTree)) {
    throw new FetchError('Layout response has no logicalTree');
  }
  const topLevel = layout.logicalTree.children;
  if (!Array.isArray(topLevel)) {
    throw new FetchError('Layout response has no logicalTree.children');
  }

  const equipment: EquipmentMap = new Map<number, EquipmentData>();
  const stack: Array<{ node: unknown; path: string }> = [];
  for (let i = topLevel.length - 1; i >= 0; i--) {
    stack.push({ node: topLevel[i], path: `${i}` });
  }

  let current = stack.pop();
  while (current) {
    const node = toLayoutNode(current.node, current.path);
    equipment.set(node.data.id, node.data);

    // Reverse push keeps children in document order
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push({ node: node.children[i], path: `${current.path}.${i}` });
    }
    current = stack.pop();
  }

  return equipment;
}

/**
 * End index (exclusive) of the double-quoted string starting at `start`
 */
function scanDoubleQuoted(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === '\\') {
      i += 2;
    } else if (text[i] === '"') {
      return i + 1;
    } else {
      i++;
    }
  }
  return text.length;
}

/**
 * Convert the single-quoted string starting at `start` to a JSON string
 */
function convertSingleQuoted(text: string, start: number): { json: string; end: number } {
  let json = '"';
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\' && i + 1 < text.length) {
      const next = text[i + 1];
      json += next === "'" ? "'" : ch + next;
      i += 2;
    } else if (ch === "'") {
      return { json: json + '"', end: i + 1 };
    } else {
      json += ch === '"' ? '\\"' : ch;
      i++;
    }
  }
  // Unterminated: left for JSON.parse to reject
  return { json, end: text.length };
}

/**
 * Convert the playback response (a JavaScript object literal) to strict JSON text.
 * Single-quoted strings become JSON strings and bare keys such as timeUnit,
 * fieldData, fieldDataArray, reportersData, key and value get quoted.
 * String contents are never rewritten, so valid JSON passes through unchanged.
 */
export function normalizeEnergyPayload(text: string): string {
  let out = '';
  let lastToken = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === '"') {
      const end = scanDoubleQuoted(text, i);
      out += text.slice(i, end);
      lastToken = '"';
      i = end;
    } else if (ch === "'") {
      const { json, end } = convertSingleQuoted(text, i);
      out += json;
      lastToken = '"';
      i = end;
    } else if (IDENTIFIER_START.test(ch) && (lastToken === '{' || lastToken === ',')) {
      let end = i + 1;
      while (end < text.length && IDENTIFIER_PART.test(text[end])) {
        end++;
      }
      let colon = end;
      while (colon < text.length && WHITESPACE.test(text[colon])) {
        colon++;
      }
      const identifier = text.slice(i, end);
      out += text[colon] === ':' ? `"${identifier}"` : identifier;
      lastToken = identifier;
      i = end;
    } else {
      out += ch;
      if (!WHITESPACE.test(ch)) {
        lastToken = ch;
      }
      i++;
    }
  }

  return out;
}

/**
 * Parse a reporter timestamp ("Mon Jan 02 15:04:05 GMT 2006").
 * The returned Date's UTC fields equal the text.
 */
export function parseReporterTimestamp(text: string): Date {
  const match = REPORTER_TIMESTAMP.exec(text);
  const month = match ? MONTHS[match[1]] : undefined;
  if (!match || month === undefined) {
    throw new FetchError(`Unexpected reporter timestamp: ${text}`);
  }

  const day = Number(match[2]);
  const year = Number(match[6]);
  const date = new Date(Date.UTC(
    year,
    month,
    day,
    Number(match[3]),
    Number(match[4]),
    Number(match[5]),
  ));

  // Date.UTC rolls over out-of-range fields (Feb 30 -> Mar 2)
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== Number(match[3]) ||
    date.getUTCMinutes() !== Number(match[4]) ||
    date.getUTCSeconds() !== Number(match[5])
  ) {
    throw new FetchError(`Invalid reporter timestamp: ${text}`);
  }

  return date;
}

function parseEquipmentId(key: unknown, timestamp: string): number {
  const id = typeof key === 'string' && INTEGER.test(key.trim()) ? Number(key.trim()) : key;
  if (typeof id !== 'number' || !Number.isSafeInteger(id)) {
    throw new FetchError(`Invalid equipment key ${JSON.stringify(key)} at ${timestamp}`);
  }
  return id;
}

function parseEnergyValue(value: unknown, timestamp: string): number {
  const energy = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof energy !== 'number' || !Number.isFinite(energy)) {
    throw new FetchError(`Invalid energy value ${JSON.stringify(value)} at ${timestamp}`);
  }
  return energy;
}

/**
 * Parse the playback response into one EnergyData per reporting interval.
 * Samples keep the order of the reportersData keys in the response.
 */
export function parseEnergyData(text: string): EnergyData[] {
  let payload: unknown;
  try {
    payload = JSON.parse(normalizeEnergyPayload(text));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FetchError(`Could not parse playback data: ${reason}`, undefined, text);
  }

  if (!isRecord(payload) || !isRecord(payload.reportersData)) {
    throw new FetchError('Playback data has no reportersData', undefined, text);
  }

  const energyData: EnergyData[] = [];
  for (const [timestamp, groups] of Object.entries(payload.reportersData)) {
    if (!isRecord(groups)) {
      throw new FetchError(`Reporters at ${timestamp} are not grouped`);
    }

    const values = new Map<number, number>();
    for (const [group, entries] of Object.entries(groups)) {
      if (!Array.isArray(entries)) {
        throw new FetchError(`Reporter group ${group} at ${timestamp} is not a list`);
      }
      for (const entry of entries) {
        if (!isRecord(entry)) {
          throw new FetchError(`Reporter entry in ${group} at ${timestamp} is not an object`);
        }
        values.set(parseEquipmentId(entry.key, timestamp), parseEnergyValue(entry.value, timestamp));
      }
    }

    energyData.push({ startTime: parseReporterTimestamp(timestamp), values });
  }

  return energyData;
}
