/**
 * PrefixMap - prefix table and CURIE converter
 *
 * Maps short names to namespace IRIs. `compress` picks the longest matching
 * namespace. In `safe` mode unknown prefixes raise {@link UnknownPrefixError};
 * in `fast` mode the input is returned unchanged.
 */

import { UnknownPrefixError } from '../errors/QueryErrors';
import { STANDARD_PREFIXES } from './external';

export type PrefixMode = 'safe' | 'fast';

export type PrefixedValueKind = 'iri' | 'curie';

const ABSOLUTE_IRI = /^[a-zA-Z][a-zA-Z\d+.-]*:[^\s<>"{}|\\^`]*$/u;
const PREFIX_NAME = /^[A-Za-z][\w.-]*$/u;

function isPairIterable(
  entries: Readonly<Record<string, string>> | Iterable<[string, string]>,
): entries is Iterable<[string, string]> {
  return Symbol.iterator in entries;
}

export class PrefixMap {
  private readonly namespaces = new Map<string, string>();

  public constructor(entries: Readonly<Record<string, string>> | Iterable<[string, string]> = {}) {
    const pairs = isPairIterable(entries) ? entries : Object.entries(entries);
    for (const [ prefix, namespace ] of pairs) {
      this.set(prefix, namespace);
    }
  }

  /** rdf, rdfs, xsd, owl, skos and dcterms. */
  public static standard(): PrefixMap {
    return new PrefixMap(STANDARD_PREFIXES);
  }

  public set(prefix: string, namespace: string): this {
    if (prefix !== '' && !PREFIX_NAME.test(prefix)) {
      throw new Error(`'${prefix}' is not a valid prefix name`);
    }
    if (!ABSOLUTE_IRI.test(namespace)) {
      throw new Error(`'${namespace}' is not a valid URI`);
    }
    this.namespaces.set(prefix, namespace);
    return this;
  }

  public get(prefix: string): string | undefined {
    return this.namespaces.get(prefix);
  }

  public has(prefix: string): boolean {
    return this.namespaces.has(prefix);
  }

  public get size(): number {
    return this.namespaces.size;
  }

  /** Copy with the entries of `other` added; `other` wins on conflicts. */
  public merge(other: PrefixMap | Readonly<Record<string, string>>): PrefixMap {
    const merged = new PrefixMap(this.toRecord());
    const record = other instanceof PrefixMap ? other.toRecord() : other;
    for (const [ prefix, namespace ] of Object.entries(record)) {
      merged.set(prefix, namespace);
    }
    return merged;
  }

  public toRecord(): Record<string, string> {
    return Object.fromEntries(this.namespaces);
  }

  /**
   * Whether `value` is an IRI under a known namespace or a CURIE with a
   * known prefix. IRIs are tried first.
   */
  public validate(value: string): PrefixedValueKind {
    if (this.splitIri(value)) {
      return 'iri';
    }
    if (this.splitCurie(value)) {
      return 'curie';
    }
    throw new UnknownPrefixError(value);
  }

  /** `[prefix, localName]` of an IRI or CURIE. */
  public parse(value: string): [string, string] {
    const parts = this.validate(value) === 'iri' ? this.splitIri(value) : this.splitCurie(value);
    if (!parts) {
      throw new UnknownPrefixError(value);
    }
    return parts;
  }

  public expand(curie: string, mode: PrefixMode = 'safe'): string {
    if (mode === 'fast') {
      const parts = this.splitCurie(curie);
      return parts ? this.join(parts) : curie;
    }
    if (this.validate(curie) === 'iri') {
      return curie;
    }
    return this.join(this.parse(curie));
  }

  public compress(iri: string, mode: PrefixMode = 'safe'): string {
    if (mode === 'fast') {
      const parts = this.splitIri(iri);
      return parts ? `${parts[0]}:${parts[1]}` : iri;
    }
    if (this.validate(iri) === 'curie') {
      return iri;
    }
    const [ prefix, local ] = this.parse(iri);
    return `${prefix}:${local}`;
  }

  public standardize(curie: string): string {
    return this.compress(this.expand(curie));
  }

  private join([ prefix, local ]: [string, string]): string {
    return `${this.namespaces.get(prefix) ?? ''}${local}`;
  }

  private splitIri(iri: string): [string, string] | undefined {
    if (!ABSOLUTE_IRI.test(iri)) {
      return undefined;
    }
    let best: [string, string] | undefined;
    let bestLength = -1;
    for (const [ prefix, namespace ] of this.namespaces) {
      if (iri.startsWith(namespace) && namespace.length > bestLength) {
        best = [ prefix, iri.slice(namespace.length) ];
        bestLength = namespace.length;
      }
    }
    return best;
  }

  private splitCurie(curie: string): [string, string] | undefined {
    const index = curie.indexOf(':');
    if (index < 0) {
      return undefined;
    }
    const prefix = curie.slice(0, index);
    if (!this.namespaces.has(prefix) || curie.startsWith('//', index + 1)) {
      return undefined;
    }
    return [ prefix, curie.slice(index + 1) ];
  }
}
