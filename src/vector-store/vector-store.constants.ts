export const QDRANT_CLIENT = Symbol('QDRANT_CLIENT');

/** Namespace for deriving Qdrant point ids from chunk ids */
export const POINT_ID_NAMESPACE = '6f1c2a4e-8d0b-4b7e-9a53-2c1e7f9d4b10';
