import { ValidationError } from '../../shared/errors';
import { getPropertyIndexName, getProspectIndexName } from './mappings/stacker-index.v1';

export type DocumentType = 'property' | 'prospect';

export type StackerDocument = Record<string, unknown>;

interface DocumentKindBase<T extends DocumentType> {
  readonly name: T;
  /** Identity field of this document type, also the bulk `_id` source. */
  readonly idField: `${T}_id`;
  /** Key of this kind's result set in the search response. */
  readonly resultsKey: T extends 'property' ? 'properties' : 'prospects';
  indexName(): string;
  /** Converts an indexed document into its external representation. */
  present(doc: StackerDocument): StackerDocument;
}

export type PropertyKind = DocumentKindBase<'property'>;
export type ProspectKind = DocumentKindBase<'prospect'>;
export type DocumentKind = PropertyKind | ProspectKind;

export const PROPERTY: PropertyKind = {
  name: 'property',
  idField: 'property_id',
  resultsKey: 'properties',
  indexName: getPropertyIndexName,
  present: (doc) => ({ ...doc }),
};

export const PROSPECT: ProspectKind = {
  name: 'prospect',
  idField: 'prospect_id',
  resultsKey: 'prospects',
  indexName: getProspectIndexName,
  present: (doc) => {
    const { owner_status, ...rest } = doc;
    return { ...rest, owner_verified_status: owner_status };
  },
};

export const DOCUMENT_KINDS: readonly DocumentKind[] = [PROPERTY, PROSPECT];

export function kindFor(type: DocumentType): DocumentKind {
  return type === 'property' ? PROPERTY : PROSPECT;
}

export function kindForIndex(indexName: string): DocumentKind {
  const kind = DOCUMENT_KINDS.find((k) => k.indexName() === indexName);
  if (!kind) {
    throw new ValidationError('Index name does not exist.');
  }
  return kind;
}
