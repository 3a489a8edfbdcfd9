import type { NamedNode } from '@rdfjs/types';
import { getLoggerFor } from 'global-logger-factory';

import {
  dataFactory,
  isIRI,
  stringLiteral,
  type GraphName,
  type GroundTerm,
  type Triple,
} from '../rdf/terms';
import type { Dataset, GraphTriple } from '../storage/dataset/Dataset';
import { DATASET_LOCK } from '../storage/dataset/GraphLocker';
import type { OntologyQueryEngine, QueryContext } from '../storage/sparql/OntologyQueryEngine';
import { RDF, SKOSXL } from '../vocab/external';
import { SkosMigrationQueries } from './SkosMigrationQueries';
import type { UriMapping } from './UriMapping';

export interface UriReplacementOptions {
  /** Named graph to rewrite; the default graph otherwise. */
  graph?: string;
  /** Predicate linking a domain IRI to the public IRI it replaced. */
  sourcedFrom?: string;
}

export interface UriReplacementReport {
  /** Public concepts found in the graph. */
  concepts: number;
  /** Mappings created by this run. */
  minted: number;
  /** Statements rewritten to use domain IRIs. */
  replaced: number;
  /** Provenance statements added. */
  added: number;
  /** Public IRI to domain IRI, for the concepts of this run. */
  mapping: Record<string, string>;
}

/**
 * Replaces public concept IRIs with domain IRIs from a {@link UriMapping}.
 *
 * Concepts are the IRIs typed `skos:Concept`, or typed with a direct subclass
 * of it, that are not already domain IRIs. Every statement using such an IRI
 * as subject or object is rewritten. SKOS-XL labels attached to a concept have
 * the concept IRI inside their own IRI replaced as well. Each domain IRI gets
 * a literal naming the public IRI it came from.
 */
export class UriReplacement {
  protected readonly logger = getLoggerFor(this);
  private readonly graph: GraphName;
  private readonly sourcedFrom: NamedNode;

  public constructor(
    private readonly engine: OntologyQueryEngine,
    private readonly mapping: UriMapping,
    private readonly options: UriReplacementOptions = {},
  ) {
    this.graph = options.graph ? dataFactory.namedNode(options.graph) : dataFactory.defaultGraph();
    this.sourcedFrom = dataFactory.namedNode(options.sourcedFrom ?? `${mapping.baseIri}property/sourced_from`);
  }

  public async run(context: Omit<QueryContext, 'prefixes'> = {}): Promise<UriReplacementReport> {
    const query = SkosMigrationQueries.publicConcepts(this.mapping.baseIri, { graph: this.options.graph });
    const result = await this.engine.select(query.query, { ...context, prefixes: query.prefixes });
    const concepts: string[] = [];
    for (const row of result.rows) {
      if (isIRI(row.concept)) {
        concepts.push(row.concept.value);
      }
    }
    this.logger.info(`Found ${concepts.length} public concepts`);

    const before = this.mapping.size;
    const targets = new Map(concepts.map((iri) => [ iri, this.mapping.getOrMint(iri) ]));
    const minted = this.mapping.size - before;
    this.logger.info(`Minted ${minted} domain IRIs`);

    const dataset = this.engine.getDataset();
    const { replaced, added } = await dataset.locker.withWriteLock([ DATASET_LOCK ], async() =>
      this.rewrite(dataset, targets));
    this.logger.info(`Replaced ${replaced} and added ${added} triples`);

    return { concepts: concepts.length, minted, replaced, added, mapping: Object.fromEntries(targets) };
  }

  /**
   * Applies the whole rewrite without awaiting, so readers see it at once.
   */
  private rewrite(dataset: Dataset, targets: ReadonlyMap<string, string>): { replaced: number; added: number } {
    const renamed = this.renames(dataset, targets);
    const rename = <T extends GroundTerm>(term: T): T | NamedNode => isIRI(term) ? renamed.get(term.value) ?? term : term;

    const removals: Triple[] = [];
    const additions: GraphTriple[] = [];
    for (const triple of dataset.snapshot(this.graph)) {
      const subject = rename(triple.subject);
      const object = rename(triple.object);
      if (subject !== triple.subject || object !== triple.object) {
        removals.push(triple);
        additions.push({ graph: this.graph, triple: { subject, predicate: triple.predicate, object }});
      }
    }
    for (const triple of removals) {
      dataset.removeTriple(this.graph, triple);
    }
    dataset.addAll(additions);

    const provenance: GraphTriple[] = [ ...targets ].map(([ publicIri, domainIri ]) => ({
      graph: this.graph,
      triple: {
        subject: dataFactory.namedNode(domainIri),
        predicate: this.sourcedFrom,
        object: stringLiteral(this.mapping.compress(publicIri)),
      },
    }));
    return { replaced: removals.length, added: dataset.addAll(provenance) };
  }

  /**
   * Concept IRIs to their domain IRIs, plus the SKOS-XL labels of those
   * concepts whose IRI embeds the concept IRI.
   */
  private renames(dataset: Dataset, targets: ReadonlyMap<string, string>): Map<string, NamedNode> {
    const labels = new Set<string>();
    for (const triple of dataset.match(this.graph, { predicate: dataFactory.namedNode(RDF.type), object: dataFactory.namedNode(SKOSXL.Label) })) {
      labels.add(triple.subject.value);
    }

    const renamed = new Map<string, NamedNode>();
    for (const [ publicIri, domainIri ] of targets) {
      renamed.set(publicIri, dataFactory.namedNode(domainIri));
    }
    for (const [ publicIri, domainIri ] of targets) {
      for (const { object } of dataset.match(this.graph, { subject: dataFactory.namedNode(publicIri) })) {
        if (!isIRI(object) || !labels.has(object.value) || renamed.has(object.value)) {
          continue;
        }
        const label = object.value.split(publicIri).join(domainIri);
        if (label !== object.value) {
          renamed.set(object.value, dataFactory.namedNode(label));
        }
      }
    }
    return renamed;
  }
}
