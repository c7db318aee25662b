// Framework-only entry points of relations and hosts. Not exported from the
// package index.

/** Writes a relation's value without modifier checks or notifications. */
export const SET_TARGET = Symbol("setTarget");

/** Adds an existing relation instance to a host. */
export const ATTACH_RELATION = Symbol("attachRelation");

/** Called on a relation after its host has deleted it. */
export const RELATION_REMOVED = Symbol("relationRemoved");
