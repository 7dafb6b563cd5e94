/**
 * Trust tokens for forward scope lookups
 *
 * Only the reducer and the string-hint evaluator may make a forward scope
 * fabricate proxies for missing names. Every other caller gets a plain
 * lookup miss. These symbols are deliberately absent from the package index.
 */

export const ENGINE_TRUST: unique symbol = Symbol("hintwarden.trust.engine");
export const EVALUATOR_TRUST: unique symbol = Symbol(
  "hintwarden.trust.evaluator"
);

export type TrustToken = typeof ENGINE_TRUST | typeof EVALUATOR_TRUST;

export const isTrusted = (token: symbol | undefined): token is TrustToken =>
  token === ENGINE_TRUST || token === EVALUATOR_TRUST;
