import { describe, it, expect } from 'vitest';

import { DomainCodes, RecordExistsError, UriMapping } from '../../src/migration/UriMapping';
import { PrefixMap } from '../../src/vocab/PrefixMap';
import { EX } from '../helpers/ontology';

const DOMAIN = 'http://example.org/domain/';

function anatomy(entries: [string, string][] = []): UriMapping {
  return new UriMapping({
    baseIri: DOMAIN,
    domain: 'anatomy',
    domainCode: 7,
    prefixes: new PrefixMap({ ex: EX }),
    entries,
  });
}

describe('UriMapping', () => {
  it('should mint sequential identifiers under the domain code', () => {
    const mapping = anatomy();

    expect(mapping.getOrMint('ex:Heart')).toBe(`${DOMAIN}07000001`);
    expect(mapping.getOrMint(`${EX}Lung`)).toBe(`${DOMAIN}07000002`);
    expect(mapping.getOrMint(`${EX}Heart`)).toBe(`${DOMAIN}07000001`);
    expect(mapping.size).toBe(2);
    expect(mapping.has('ex:Lung')).toBe(true);
    expect(mapping.toRecord()).toEqual({
      [`${EX}Heart`]: `${DOMAIN}07000001`,
      [`${EX}Lung`]: `${DOMAIN}07000002`,
    });
  });

  it('should skip identifiers that are already mapped', () => {
    const mapping = anatomy([[ 'ex:Old', `${DOMAIN}07000001` ]]);

    expect(mapping.getOrMint('ex:Heart')).toBe(`${DOMAIN}07000002`);
  });

  it('should refuse to remap a key', () => {
    const mapping = anatomy([[ 'ex:Heart', `${DOMAIN}07000001` ]]);

    expect(() => mapping.set(`${EX}Heart`, `${DOMAIN}07000001`)).not.toThrow();
    expect(() => mapping.set('ex:Heart', `${DOMAIN}07000002`)).toThrow(RecordExistsError);
  });

  it('should compress public IRIs with its prefixes', () => {
    const mapping = anatomy();

    expect(mapping.compress(`${EX}Heart`)).toBe('ex:Heart');
    expect(mapping.compress('http://other.example/x')).toBe('http://other.example/x');
    expect(mapping.isDomainIri(`${DOMAIN}07000001`)).toBe(true);
  });

  it('should resolve the domain from a registered code', () => {
    const mapping = new UriMapping({ baseIri: DOMAIN, domainCode: '7', domainCodes: { anatomy: 7 }});

    expect(mapping.domain).toBe('anatomy');
    expect(mapping.domainCode).toBe('07');
    expect(() => new UriMapping({ baseIri: DOMAIN, domainCode: 8 })).toThrow('Domain code 08 is not registered');
  });
});

describe('DomainCodes', () => {
  it('should keep domains and codes unique', () => {
    const codes = new DomainCodes({ anatomy: 7 });

    expect(codes.register('anatomy', '07')).toBe('07');
    expect(() => codes.register('physiology', 7)).toThrow('Domain code 07 is already registered for domain anatomy');
    expect(() => codes.register('anatomy', 8)).toThrow('Domain anatomy is already registered with domain code 07');
    expect(() => codes.register('cell biology', 9)).toThrow('Domain cannot contain whitespaces');
    expect(() => codes.register('cells', 100)).toThrow('out of bounds');
    expect(codes.toRecord()).toEqual({ anatomy: '07' });
  });
});
