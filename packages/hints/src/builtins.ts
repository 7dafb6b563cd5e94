/**
 * Builtin namespace
 *
 * Names every forward scope is seeded with before the declaring scope's own
 * bindings: the primitive keywords, the standard global classes and the
 * standard generic templates.
 */

import type { GenericHint, Hint } from "./hint-types.js";
import { classHint, generic, primitive, typeParameter } from "./hint-factories.js";

const T = typeParameter("T");
const K = typeParameter("K");
const V = typeParameter("V");
const TReturn = typeParameter("TReturn");
const TNext = typeParameter("TNext");

export const ARRAY_TEMPLATE = generic("Array", [T], Array);
export const READONLY_ARRAY_TEMPLATE = generic("ReadonlyArray", [T], Array);
export const SET_TEMPLATE = generic("Set", [T], Set);
export const MAP_TEMPLATE = generic("Map", [K, V], Map);
export const RECORD_TEMPLATE = generic("Record", [K, V], Object);
export const PROMISE_TEMPLATE = generic("Promise", [T], Promise);
export const ITERABLE_TEMPLATE = generic("Iterable", [T]);
export const ITERATOR_TEMPLATE = generic("Iterator", [T]);
export const GENERATOR_TEMPLATE = generic("Generator", [T, TReturn, TNext]);
export const ASYNC_ITERABLE_TEMPLATE = generic("AsyncIterable", [T]);
export const ASYNC_ITERATOR_TEMPLATE = generic("AsyncIterator", [T]);
export const ASYNC_GENERATOR_TEMPLATE = generic("AsyncGenerator", [
  T,
  TReturn,
  TNext,
]);

/** Templates a synchronous generator callable may declare as its return */
export const SYNC_GENERATOR_RETURN_TEMPLATES: readonly GenericHint[] = [
  GENERATOR_TEMPLATE,
  ITERATOR_TEMPLATE,
  ITERABLE_TEMPLATE,
];

/** Templates an asynchronous generator callable may declare as its return */
export const ASYNC_GENERATOR_RETURN_TEMPLATES: readonly GenericHint[] = [
  ASYNC_GENERATOR_TEMPLATE,
  ASYNC_ITERATOR_TEMPLATE,
  ASYNC_ITERABLE_TEMPLATE,
];

const templates: readonly GenericHint[] = [
  ARRAY_TEMPLATE,
  READONLY_ARRAY_TEMPLATE,
  SET_TEMPLATE,
  MAP_TEMPLATE,
  RECORD_TEMPLATE,
  PROMISE_TEMPLATE,
  ITERABLE_TEMPLATE,
  ITERATOR_TEMPLATE,
  GENERATOR_TEMPLATE,
  ASYNC_ITERABLE_TEMPLATE,
  ASYNC_ITERATOR_TEMPLATE,
  ASYNC_GENERATOR_TEMPLATE,
];

const objectHint = classHint(Object);

export const BUILTIN_SCOPE: ReadonlyMap<string, Hint> = new Map<string, Hint>([
  ["string", primitive("string")],
  ["number", primitive("number")],
  ["boolean", primitive("boolean")],
  ["bigint", primitive("bigint")],
  ["symbol", primitive("symbol")],
  ["object", objectHint],
  ["Object", objectHint],
  ["String", classHint(String)],
  ["Number", classHint(Number)],
  ["Boolean", classHint(Boolean)],
  ["Function", classHint(Function)],
  ["Date", classHint(Date)],
  ["RegExp", classHint(RegExp)],
  ["Error", classHint(Error)],
  ["TypeError", classHint(TypeError)],
  ["RangeError", classHint(RangeError)],
  ["ArrayBuffer", classHint(ArrayBuffer)],
  ["DataView", classHint(DataView)],
  ["Uint8Array", classHint(Uint8Array)],
  ["URL", classHint(URL)],
  ...templates.map((template): [string, Hint] => [template.name, template]),
]);
