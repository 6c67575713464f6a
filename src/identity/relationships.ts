/**
 * Relationship types used by the identity stores. The class name is the
 * relationship type written to the graph.
 */

/** Owner → claim, login or token. */
export class Has {}

/** User → role membership. */
export class IsIn {}
