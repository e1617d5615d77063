export const MILVUS_CLIENT = Symbol('MILVUS_CLIENT');

export const FIELD_ID = 'id';
export const FIELD_EMBEDDING = 'embedding';
export const FIELD_TEXT = 'text';
export const FIELD_METADATA = 'metadata';

export const ID_MAX_LENGTH = 64;
export const TEXT_MAX_LENGTH = 65535;
// Rows per scalar query page.
export const QUERY_PAGE_SIZE = 1000;
