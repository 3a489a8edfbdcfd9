/**
 * UriMapping - registry of public concept IRIs and the domain IRIs that
 * replace them
 *
 * Domain IRIs are `<baseIri><domain code><six-digit id>`. A missing mapping
 * is minted on request with the lowest id whose IRI is not yet taken.
 * Keys may be given as IRIs or as CURIEs known to the prefix map.
 */

import { PrefixMap } from '../vocab/PrefixMap';

const MAX_ID = 900000;
const DOMAIN_NAME = /^\S+$/u;

export class RecordExistsError extends Error {
  public readonly key: string;

  public constructor(key: string) {
    super(`Record for key '${key}' already exists`);
    this.name = 'RecordExistsError';
    this.key = key;
  }
}

/**
 * Two-way registry of domain names and their two-digit codes. Both sides
 * are unique.
 */
export class DomainCodes {
  private readonly codes = new Map<string, string>();
  private readonly domains = new Map<string, string>();

  public constructor(entries: Readonly<Record<string, number | string>> = {}) {
    for (const [ domain, code ] of Object.entries(entries)) {
      this.register(domain, code);
    }
  }

  public static format(code: number | string): string {
    const value = typeof code === 'number' ? code : Number.parseInt(code, 10);
    if (!Number.isInteger(value) || value < 0 || value >= 100) {
      throw new Error(`Domain code ${code} is out of bounds: 0 <= domain_code < 100`);
    }
    return String(value).padStart(2, '0');
  }

  public register(domain: string, code: number | string): string {
    const formatted = DomainCodes.format(code);
    if (this.codes.get(domain) === formatted) {
      return formatted;
    }
    if (!DOMAIN_NAME.test(domain)) {
      throw new Error('Domain cannot contain whitespaces');
    }
    const existing = this.codes.get(domain);
    if (existing !== undefined) {
      throw new Error(`Domain ${domain} is already registered with domain code ${existing}`);
    }
    const owner = this.domains.get(formatted);
    if (owner !== undefined) {
      throw new Error(`Domain code ${formatted} is already registered for domain ${owner}`);
    }
    this.codes.set(domain, formatted);
    this.domains.set(formatted, domain);
    return formatted;
  }

  public codeOf(domain: string): string {
    const code = this.codes.get(domain);
    if (code === undefined) {
      throw new Error(`Domain ${domain} is not registered`);
    }
    return code;
  }

  public domainOf(code: number | string): string {
    const formatted = DomainCodes.format(code);
    const domain = this.domains.get(formatted);
    if (domain === undefined) {
      throw new Error(`Domain code ${formatted} is not registered`);
    }
    return domain;
  }

  public toRecord(): Record<string, string> {
    return Object.fromEntries(this.codes);
  }
}

export interface UriMappingOptions {
  /** Namespace every minted IRI starts with. */
  baseIri: string;
  /** Domain the minted IRIs belong to. Registered when `domainCode` is given too. */
  domain?: string;
  domainCode?: number | string;
  /** Codes already handed out to other domains. */
  domainCodes?: Readonly<Record<string, number | string>>;
  prefixes?: PrefixMap;
  /** Existing public to domain mappings. */
  entries?: Iterable<[string, string]>;
}

export class UriMapping {
  public readonly baseIri: string;
  public readonly domainCodes: DomainCodes;
  public readonly prefixes: PrefixMap;

  private readonly code: string;
  private readonly targets = new Map<string, string>();
  private readonly taken = new Set<string>();
  private nextId = 1;

  public constructor(options: UriMappingOptions) {
    this.baseIri = options.baseIri;
    this.domainCodes = new DomainCodes(options.domainCodes);
    this.prefixes = options.prefixes ?? new PrefixMap();

    const { domain, domainCode } = options;
    if (domain !== undefined && domainCode !== undefined) {
      this.code = this.domainCodes.register(domain, domainCode);
    } else if (domain !== undefined) {
      this.code = this.domainCodes.codeOf(domain);
    } else if (domainCode !== undefined) {
      this.code = DomainCodes.format(domainCode);
      this.domainCodes.domainOf(this.code);
    } else {
      throw new Error('Either a domain or a domain code is required');
    }

    for (const [ key, target ] of options.entries ?? []) {
      this.set(key, target);
    }
  }

  public get domain(): string {
    return this.domainCodes.domainOf(this.code);
  }

  public get domainCode(): string {
    return this.code;
  }

  public get size(): number {
    return this.targets.size;
  }

  public has(key: string): boolean {
    return this.targets.has(this.prefixes.expand(key, 'fast'));
  }

  public get(key: string): string | undefined {
    return this.targets.get(this.prefixes.expand(key, 'fast'));
  }

  /**
   * Records a mapping. Setting the same pair again is a no-op; mapping a key
   * to a different IRI fails.
   */
  public set(key: string, target: string): this {
    const iri = this.prefixes.expand(key, 'fast');
    const targetIri = this.prefixes.expand(target, 'fast');
    const existing = this.targets.get(iri);
    if (existing !== undefined) {
      if (existing === targetIri) {
        return this;
      }
      throw new RecordExistsError(iri);
    }
    this.targets.set(iri, targetIri);
    this.taken.add(targetIri);
    return this;
  }

  /** The domain IRI for `key`, minting one if there is none yet. */
  public getOrMint(key: string): string {
    const existing = this.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const minted = this.mint();
    this.set(key, minted);
    return minted;
  }

  public isDomainIri(iri: string): boolean {
    return iri.startsWith(this.baseIri);
  }

  /** CURIE form of `iri` where a prefix is known, the IRI itself otherwise. */
  public compress(iri: string): string {
    return this.prefixes.compress(iri, 'fast');
  }

  /** Mappings sorted by public IRI. */
  public entries(): [string, string][] {
    return [ ...this.targets ].sort(([ left ], [ right ]) => left < right ? -1 : left > right ? 1 : 0);
  }

  public toRecord(): Record<string, string> {
    return Object.fromEntries(this.entries());
  }

  private mint(): string {
    while (this.taken.has(this.format(this.nextId))) {
      this.nextId++;
      if (this.nextId >= MAX_ID) {
        throw new Error(`No identifiers left for domain code ${this.code}`);
      }
    }
    return this.format(this.nextId);
  }

  private format(id: number): string {
    return `${this.baseIri}${this.code}${String(id).padStart(6, '0')}`;
  }
}
