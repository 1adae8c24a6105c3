import * as xml2js from 'xml2js';
import { INCLUDED_COMPONENT_SCOPES } from '../constants';
import { errorMessage, MalformedInputError } from '../errors';
import { canonicalizeRaw } from '../purl';
import { ComponentRecord, CycloneDXComponent, CycloneDXDocument, Identifier, IdentifierSet } from '../types';
import { isRecord, validateCycloneDXShape } from './sbom-validators';

export interface ExtractOptions {
  // Also walk `components[].components` (CycloneDX assemblies). Off by default:
  // only the top-level list is compared.
  includeNested?: boolean;
}

export interface ExtractionResult {
  identifiers: IdentifierSet;
  componentCount: number;
  warnings: string[];
}

export function parseSbomDocument(text: string, source?: string): unknown {
  try {
    return JSON.parse(text);
  } catch (e: unknown) {
    throw new MalformedInputError(`SBOM is not valid JSON (${errorMessage(e)})`, source);
  }
}

// `xml2js` wraps every child element in an array and puts text content either
// directly in the array or under `_` when the element carries attributes.
function firstText(value: unknown): string | undefined {
  const v = Array.isArray(value) ? value[0] : value;
  if (typeof v === 'string') return v;
  if (isRecord(v) && typeof v._ === 'string') return v._;
  return undefined;
}

function xmlComponentList(value: unknown): CycloneDXComponent[] | undefined {
  const container: unknown = Array.isArray(value) ? value[0] : value;
  if (container === undefined) return undefined;
  if (!isRecord(container)) return []; // <components/>
  const raw = container.component;
  const entries: unknown[] = Array.isArray(raw) ? raw : raw === undefined ? [] : [raw];
  const out: CycloneDXComponent[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const component: CycloneDXComponent = {};
    const purl = firstText(entry.purl);
    const scope = firstText(entry.scope);
    if (purl !== undefined) component.purl = purl;
    if (scope !== undefined) component.scope = scope;
    const nested = xmlComponentList(entry.components);
    if (nested) component.components = nested;
    out.push(component);
  }
  return out;
}

// Converts a CycloneDX XML BOM into the JSON document shape.
export async function parseSbomXml(text: string, source?: string): Promise<CycloneDXDocument> {
  let parsed: unknown;
  try {
    parsed = await xml2js.parseStringPromise(text);
  } catch (e: unknown) {
    throw new MalformedInputError(`SBOM is not valid XML (${errorMessage(e)})`, source);
  }
  const bom = isRecord(parsed) ? parsed.bom : undefined;
  if (!isRecord(bom)) throw new MalformedInputError('XML document has no <bom> root', source);
  const doc: CycloneDXDocument = { bomFormat: 'CycloneDX' };
  const attrs = bom.$;
  if (isRecord(attrs) && typeof attrs.xmlns === 'string') {
    const m = /\/bom\/(\d+\.\d+)$/.exec(attrs.xmlns);
    if (m) doc.specVersion = m[1];
  }
  const components = xmlComponentList(bom.components);
  if (components) doc.components = components;
  return doc;
}

// Picks the parser by content: CycloneDX XML starts with '<', everything else is treated as JSON.
export async function loadSbomDocument(text: string, source?: string): Promise<unknown> {
  if (text.trimStart().startsWith('<')) return parseSbomXml(text, source);
  return parseSbomDocument(text, source);
}

function* walk(list: unknown, includeNested: boolean): Generator<ComponentRecord> {
  if (!Array.isArray(list)) return;
  for (const c of list) {
    if (!isRecord(c)) continue;
    const record: ComponentRecord = {};
    if (typeof c.purl === 'string') record.purl = c.purl;
    if (c.scope !== undefined && c.scope !== null) record.scope = String(c.scope);
    yield record;
    if (includeNested) yield* walk(c.components, includeNested);
  }
}

export function readComponents(document: CycloneDXDocument, options: ExtractOptions = {}): Iterable<ComponentRecord> {
  return { [Symbol.iterator]: () => walk(document.components, !!options.includeNested) };
}

// Absent scope counts as required (the CycloneDX default).
export function isIncluded(component: ComponentRecord): component is ComponentRecord & { purl: string } {
  if (!component.purl || !component.purl.trim()) return false;
  return component.scope === undefined || INCLUDED_COMPONENT_SCOPES.includes(component.scope);
}

export function extractObserved(document: unknown, options: ExtractOptions = {}, source?: string): ExtractionResult {
  const validation = validateCycloneDXShape(document);
  if (!validation.valid || !isRecord(document)) {
    throw new MalformedInputError(validation.errors.join('; '), source);
  }
  const identifiers = new Set<Identifier>();
  let componentCount = 0;
  for (const component of readComponents(document, options)) {
    componentCount++;
    if (!isIncluded(component)) continue;
    identifiers.add(canonicalizeRaw(component.purl));
  }
  return { identifiers, componentCount, warnings: validation.warnings };
}

export function extractObservedSet(document: unknown, options: ExtractOptions = {}): IdentifierSet {
  return extractObserved(document, options).identifiers;
}
