import path from 'path';
import zlib from 'zlib';
import { promisify } from 'util';
import fs from 'fs-extra';
import { z } from 'zod';
import { CoverageMapFormatError } from './errors';
import { formatIdentityKey, parseIdentityKey, pathSignatureKey, type FunctionIdentity } from './identity';

const gzip = promisify(zlib.gzip);
const gunzip = promisify(zlib.gunzip);

export const MERGED_MAP_FILE = 'coverage_mapping.json';

export function shardFileName(start: number, end: number): string {
  return `coverage_mapping_${start}_${end}.json`;
}

export interface CoverageEntry {
  identity: FunctionIdentity;
  key: string;
  /** Sorted, unique. */
  tests: readonly string[];
}

function sortedUnique(tests: Iterable<string>): string[] {
  return Array.from(new Set(tests)).sort();
}

/**
 * Function identity -> tests observed executing it. Read-only once built, so a
 * single instance can back any number of concurrent commit analyses.
 */
export class CoverageMap {
  private readonly byKey: ReadonlyMap<string, CoverageEntry>;
  private readonly byPathSignature: ReadonlyMap<string, CoverageEntry[]>;
  private readonly byPath: ReadonlyMap<string, CoverageEntry[]>;

  constructor(entries: Iterable<CoverageEntry>) {
    const byKey = new Map<string, CoverageEntry>();
    const byPathSignature = new Map<string, CoverageEntry[]>();
    const byPath = new Map<string, CoverageEntry[]>();
    for (const e of entries) {
      byKey.set(e.key, e);
      const ps = pathSignatureKey(e.identity.path, e.identity.signature);
      const psList = byPathSignature.get(ps) ?? [];
      psList.push(e);
      byPathSignature.set(ps, psList);
      const pList = byPath.get(e.identity.path) ?? [];
      pList.push(e);
      byPath.set(e.identity.path, pList);
    }
    for (const list of byPathSignature.values()) list.sort((a, b) => a.identity.startLine - b.identity.startLine);
    for (const list of byPath.values()) list.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    this.byKey = byKey;
    this.byPathSignature = byPathSignature;
    this.byPath = byPath;
  }

  static empty(): CoverageMap {
    return new CoverageMap([]);
  }

  /** Builds from the persisted JSON shape, validating every key. */
  static fromRecord(raw: Record<string, readonly string[]>): CoverageMap {
    const entries: CoverageEntry[] = [];
    for (const [key, tests] of Object.entries(raw)) {
      const identity = parseIdentityKey(key);
      entries.push({ identity, key: formatIdentityKey(identity), tests: sortedUnique(tests) });
    }
    return new CoverageMap(entries);
  }

  get size(): number {
    return this.byKey.size;
  }

  lookupExact(id: FunctionIdentity): CoverageEntry | undefined {
    return this.byKey.get(formatIdentityKey(id));
  }

  /** Every recorded start line for this path and signature, ascending. */
  lookupPathless(filePath: string, signature: string): readonly CoverageEntry[] {
    return this.byPathSignature.get(pathSignatureKey(filePath, signature)) ?? [];
  }

  entriesForPath(filePath: string): readonly CoverageEntry[] {
    return this.byPath.get(filePath) ?? [];
  }

  entries(): IterableIterator<CoverageEntry> {
    return this.byKey.values();
  }

  stats(): { functions: number; tests: number; files: number } {
    const tests = new Set<string>();
    for (const e of this.byKey.values()) for (const t of e.tests) tests.add(t);
    return { functions: this.byKey.size, tests: tests.size, files: this.byPath.size };
  }

  /** Persisted shape with keys in sorted order, so equal maps serialize identically. */
  toRecord(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    const keys = Array.from(this.byKey.keys()).sort();
    for (const k of keys) {
      const entry = this.byKey.get(k);
      if (entry) out[k] = [...entry.tests];
    }
    return out;
  }
}

/** Mutable side used while recording a shard. */
export class CoverageMapAccumulator {
  private readonly tests = new Map<string, { identity: FunctionIdentity; tests: Set<string> }>();

  add(identity: FunctionIdentity, test: string): void {
    const key = formatIdentityKey(identity);
    const slot = this.tests.get(key);
    if (slot) slot.tests.add(test);
    else this.tests.set(key, { identity, tests: new Set([test]) });
  }

  get size(): number {
    return this.tests.size;
  }

  toMap(): CoverageMap {
    const entries: CoverageEntry[] = [];
    for (const [key, slot] of this.tests) entries.push({ key, identity: slot.identity, tests: sortedUnique(slot.tests) });
    return new CoverageMap(entries);
  }
}

/** Set union per identity. Commutative and idempotent. */
export function mergeCoverageMaps(maps: Iterable<CoverageMap>): CoverageMap {
  const acc = new CoverageMapAccumulator();
  for (const m of maps) {
    for (const e of m.entries()) {
      for (const t of e.tests) acc.add(e.identity, t);
    }
  }
  return acc.toMap();
}

const CoverageMapJsonSchema = z.record(z.string(), z.array(z.string()));

function isGzipPath(file: string): boolean {
  return file.endsWith('.gz');
}

export async function loadCoverageMap(file: string): Promise<CoverageMap> {
  const raw = await fs.readFile(file);
  const text = isGzipPath(file) ? (await gunzip(raw)).toString('utf-8') : raw.toString('utf-8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new CoverageMapFormatError(`${path.basename(file)} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = CoverageMapJsonSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CoverageMapFormatError(
      `${path.basename(file)} is not a coverage map: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid shape'}`,
    );
  }
  return CoverageMap.fromRecord(parsed.data);
}

/** Compact JSON; gzip when the file name ends in `.gz`. */
export async function saveCoverageMap(map: CoverageMap, file: string): Promise<void> {
  await fs.ensureDir(path.dirname(file));
  const text = JSON.stringify(map.toRecord());
  if (isGzipPath(file)) await fs.writeFile(file, await gzip(Buffer.from(text, 'utf-8')));
  else await fs.writeFile(file, text, 'utf-8');
}
