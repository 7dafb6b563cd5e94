import { describe, it } from "mocha";
import { expect } from "chai";
import {
  ANY_HINT,
  ARRAY_TEMPLATE,
  type AliasHint,
  GENERATOR_TEMPLATE,
  type HintDiagnostic,
  PROMISE_TEMPLATE,
  type RawHint,
  type Result,
  alias,
  classHint,
  generic,
  hintRepr,
  literal,
  primitive,
  subscript,
  tuple,
  typeParameter,
  union,
} from "@hintwarden/hints";
import { resolveConfig } from "./config.js";
import { createRuntimeContext } from "./runtime-context.js";
import { HINT_SANE_IGNORABLE, type HintSane } from "./sane/hint-sane.js";
import {
  type CallableMeta,
  RETURN_SLOT,
  sanitizeChildHint,
  sanitizeRootHintForCallable,
  sanitizeRootHintForStatement,
} from "./sanitize.js";
import { ResolutionSite, type ResolutionSiteOptions } from "./site.js";
import type { CallableKind } from "./reduce/return-hint.js";

class Animal {}
class User {}
class Money {}

const T = typeParameter("T");
const U = typeParameter("U");
const Box = generic("Box", [T, U]);

const string = primitive("string");
const number = primitive("number");

const [ARRAY_ELEMENT] = ARRAY_TEMPLATE.typeParameters;
if (!ARRAY_ELEMENT) throw new Error("Array template has no type parameter");

const createSite = (
  options: ResolutionSiteOptions = {},
  overrides: Readonly<Record<string, string>> = {}
): ResolutionSite =>
  new ResolutionSite(createRuntimeContext(), resolveConfig({}, { overrides }), {
    scopeName: "app.shop",
    scope: { User: classHint(User), Money: classHint(Money) },
    ...options,
  });

const unwrap = (result: Result<HintSane, HintDiagnostic>): HintSane => {
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
};

const failure = (result: Result<HintSane, HintDiagnostic>): HintDiagnostic => {
  if (result.ok) throw new Error(`unexpected success: ${hintRepr(result.value.hint)}`);
  return result.error;
};

const statement = (site: ResolutionSite, hint: RawHint): HintSane =>
  unwrap(sanitizeRootHintForStatement(site, hint));

const callable = (
  kind: CallableKind,
  annotations: Readonly<Record<string, RawHint>>
): CallableMeta => ({
  name: "handler",
  kind,
  annotations: new Map(Object.entries(annotations)),
});

describe("sanitizer", () => {
  describe("sanitizeRootHintForStatement", () => {
    it("reduces any to the ignorable model", () => {
      expect(statement(createSite(), ANY_HINT)).to.equal(HINT_SANE_IGNORABLE);
    });

    it("coerces constructors to class hints", () => {
      expect(statement(createSite(), Date).hint).to.equal(classHint(Date));
    });

    it("coerces legacy arrays to unions", () => {
      expect(hintRepr(statement(createSite(), [Date, RegExp]).hint)).to.equal(
        "Date | RegExp"
      );
      expect(statement(createSite(), [Date]).hint).to.equal(classHint(Date));
    });

    it("flattens and deduplicates unions", () => {
      const hint = union([union([string, number]), number, string]);
      expect(hintRepr(statement(createSite(), hint).hint)).to.equal(
        "string | number"
      );
    });

    it("makes unions with an ignorable member ignorable", () => {
      expect(statement(createSite(), union([string, ANY_HINT]))).to.equal(
        HINT_SANE_IGNORABLE
      );
    });

    it("rejects empty unions", () => {
      const diagnostic = failure(sanitizeRootHintForStatement(createSite(), []));
      expect(diagnostic.code).to.equal("HWD1003");
    });

    it("keeps literals, tuples and templates as they are", () => {
      const pair = tuple([string, number]);
      expect(statement(createSite(), pair).hint).to.equal(pair);
      expect(statement(createSite(), Box).hint).to.equal(Box);
      expect(statement(createSite(), literal("on")).hint).to.deep.equal(
        literal("on")
      );
    });

    it("destringifies string hints through the site scope", () => {
      const site = createSite();
      expect(hintRepr(statement(site, "Money | null").hint)).to.equal(
        "Money | null"
      );
    });

    it("turns undefined names into forward references", () => {
      const site = createSite();
      const sane = statement(site, "Invoice");

      expect(sane.hint).to.include({
        kind: "forwardRef",
        name: "Invoice",
        scopeName: "app.shop",
      });
      expect([...site.finish().keys()]).to.deep.equal(["Invoice"]);
      expect(site.finish().size).to.equal(0);
    });

    it("seeds enclosing classes by name", () => {
      class Outer {}
      const site = createSite({ classStack: [Outer] });
      expect(statement(site, "Outer").hint).to.equal(classHint(Outer));
    });

    it("substitutes the caller prefix into diagnostics", () => {
      const Solo = generic("Solo", [T]);
      const diagnostic = failure(
        sanitizeRootHintForStatement(
          createSite(),
          subscript(Solo, [string, number]),
          "Variable total "
        )
      );
      expect(diagnostic.message).to.equal(
        "Variable total type hint Solo<string, number> subscripted by 2 type arguments but declares only 1 type parameters."
      );
    });
  });

  describe("templates and type parameters", () => {
    it("binds the arguments of a partially instantiated template", () => {
      const sane = statement(createSite(), subscript(Box, [number]));
      expect(sane.hint).to.equal(Box);
      expect(sane.typeArgToHint.get(T)).to.equal(number);
      expect(sane.typeArgToHint.has(U)).to.equal(false);
    });

    it("reduces child type parameters through the parent table", () => {
      const site = createSite();
      const box = statement(site, subscript(Box, [number]));

      expect(unwrap(sanitizeChildHint(site, box, T)).hint).to.equal(number);
      expect(unwrap(sanitizeChildHint(site, box, U))).to.equal(
        HINT_SANE_IGNORABLE
      );
    });

    it("lets the child table win over the parent", () => {
      const site = createSite();
      const box = statement(site, subscript(Box, [number]));
      const inner = unwrap(sanitizeChildHint(site, box, subscript(Box, [string])));
      expect(inner.typeArgToHint.get(T)).to.equal(string);
    });

    it("cascades tables through nested templates", () => {
      const site = createSite();
      const box = statement(site, subscript(Box, [number]));
      const list = unwrap(
        sanitizeChildHint(site, box, subscript(ARRAY_TEMPLATE, [T]))
      );
      const element = unwrap(sanitizeChildHint(site, list, ARRAY_ELEMENT));
      expect(element.hint).to.equal(number);
    });

    it("rebinds a template parameter nested inside its own template", () => {
      const site = createSite();
      const outer = statement(
        site,
        subscript(ARRAY_TEMPLATE, [subscript(ARRAY_TEMPLATE, [number])])
      );
      const inner = unwrap(sanitizeChildHint(site, outer, ARRAY_ELEMENT));
      expect(inner.typeArgToHint.get(ARRAY_ELEMENT)).to.equal(number);

      const element = unwrap(sanitizeChildHint(site, inner, ARRAY_ELEMENT));
      expect(element.hint).to.equal(number);
    });

    it("rebinds a user generic nested inside itself", () => {
      const Crate = generic("Crate", [T]);
      const site = createSite();
      const outer = statement(site, subscript(Crate, [subscript(Crate, [string])]));
      const inner = unwrap(sanitizeChildHint(site, outer, T));
      expect(inner.hint).to.equal(Crate);

      expect(unwrap(sanitizeChildHint(site, inner, T)).hint).to.equal(string);
    });

    it("falls back to the bound, then to the constraints", () => {
      const Pet = typeParameter("P", { bound: classHint(Animal) });
      const Key = typeParameter("K", { constraints: [string, number] });

      expect(statement(createSite(), Pet).hint).to.equal(classHint(Animal));
      expect(hintRepr(statement(createSite(), Key).hint)).to.equal(
        "string | number"
      );
      expect(statement(createSite(), T)).to.equal(HINT_SANE_IGNORABLE);
    });

    it("reports bound violations with the argument as culprit", () => {
      const Pet = typeParameter("P", { bound: classHint(Animal) });
      const Kennel = generic("Kennel", [Pet]);
      const diagnostic = failure(
        sanitizeRootHintForStatement(createSite(), subscript(Kennel, [number]))
      );
      expect(diagnostic.code).to.equal("HWD1002");
      expect(diagnostic.culprits).to.deep.equal([number]);
    });
  });

  describe("aliases", () => {
    it("expands subscripted aliases under their own table", () => {
      const P = typeParameter("P");
      const Pair = alias("Pair", [P], () => tuple([P, P]));
      const site = createSite();
      const sane = statement(site, subscript(Pair, [string]));

      expect(hintRepr(sane.hint)).to.equal("[P, P]");
      expect(sane.typeArgToHint.get(P)).to.equal(string);
      expect(unwrap(sanitizeChildHint(site, sane, P)).hint).to.equal(string);
    });

    it("expands an alias subscripted by itself", () => {
      const P = typeParameter("P");
      const Pair = alias("Pair", [P], () => tuple([P, P]));
      const site = createSite();
      const outer = statement(site, subscript(Pair, [subscript(Pair, [number])]));
      const inner = unwrap(sanitizeChildHint(site, outer, P));

      expect(hintRepr(inner.hint)).to.equal("[P, P]");
      expect(inner.typeArgToHint.get(P)).to.equal(number);
      expect(unwrap(sanitizeChildHint(site, inner, P)).hint).to.equal(number);
    });

    it("stops at recursive aliases", () => {
      const json: AliasHint = alias("Json", [], () =>
        union([string, subscript(ARRAY_TEMPLATE, [json])])
      );
      const site = createSite();
      const root = statement(site, json);
      expect(hintRepr(root.hint)).to.equal("string | Array<Json>");

      const list = unwrap(
        sanitizeChildHint(site, root, subscript(ARRAY_TEMPLATE, [json]))
      );
      expect(unwrap(sanitizeChildHint(site, list, ARRAY_ELEMENT))).to.equal(
        HINT_SANE_IGNORABLE
      );
    });

    it("reports alias values that cannot be produced yet", () => {
      const late = alias("Late", [], () => {
        throw new ReferenceError("Cannot access 'Late' before initialization");
      });
      const diagnostic = failure(sanitizeRootHintForStatement(createSite(), late));
      expect(diagnostic.code).to.equal("HWD2003");
      expect(diagnostic.message).to.equal(
        "$HINT_SITE$ type alias Late value unresolvable: Cannot access 'Late' before initialization"
      );
    });
  });

  describe("overrides", () => {
    it("replaces overridden classes once per path", () => {
      const site = createSite({}, { Date: "Date | string" });
      const sane = statement(site, Date);

      expect(hintRepr(sane.hint)).to.equal("Date | string");
      expect(sane.overriddenNames.has("Date")).to.equal(true);
      expect(unwrap(sanitizeChildHint(site, sane, classHint(Date))).hint).to.equal(
        classHint(Date)
      );
    });
  });

  describe("sanitizeRootHintForCallable", () => {
    it("treats unannotated slots as ignorable", () => {
      const meta = callable("function", {});
      expect(
        unwrap(sanitizeRootHintForCallable(createSite(), meta, "value"))
      ).to.equal(HINT_SANE_IGNORABLE);
    });

    it("writes coerced hints back into the annotations", () => {
      const meta = callable("function", { value: [Date, RegExp], name: "string" });
      const site = createSite();
      unwrap(sanitizeRootHintForCallable(site, meta, "value"));
      unwrap(sanitizeRootHintForCallable(site, meta, "name"));

      expect(meta.annotations.get("value")).to.include({ kind: "union" });
      expect(meta.annotations.get("name")).to.deep.equal({
        kind: "deferred",
        expression: "string",
      });
    });

    it("interns equal annotations across callables", () => {
      const site = createSite();
      const first = callable("function", {
        items: subscript(ARRAY_TEMPLATE, [number]),
      });
      const second = callable("function", {
        items: subscript(ARRAY_TEMPLATE, [number]),
      });
      unwrap(sanitizeRootHintForCallable(site, first, "items"));
      unwrap(sanitizeRootHintForCallable(site, second, "items"));

      expect(second.annotations.get("items")).to.equal(
        first.annotations.get("items")
      );
    });

    it("unwraps the promise of async callables", () => {
      const site = createSite();
      const direct = callable("async", {
        [RETURN_SLOT]: subscript(PROMISE_TEMPLATE, [classHint(User)]),
      });
      const symbolic = callable("async", { [RETURN_SLOT]: "Promise<User>" });
      const bare = callable("async", { [RETURN_SLOT]: PROMISE_TEMPLATE });

      expect(
        unwrap(sanitizeRootHintForCallable(site, direct, RETURN_SLOT)).hint
      ).to.equal(classHint(User));
      expect(
        unwrap(sanitizeRootHintForCallable(site, symbolic, RETURN_SLOT)).hint
      ).to.equal(classHint(User));
      expect(
        unwrap(sanitizeRootHintForCallable(site, bare, RETURN_SLOT))
      ).to.equal(HINT_SANE_IGNORABLE);
    });

    it("rejects async returns that are not promises", () => {
      const meta = callable("async", { [RETURN_SLOT]: Date });
      const diagnostic = failure(
        sanitizeRootHintForCallable(
          createSite(),
          meta,
          RETURN_SLOT,
          "positional",
          "Function handler() return "
        )
      );
      expect(diagnostic.code).to.equal("HWD1006");
      expect(diagnostic.message).to.equal(
        "Function handler() return async callable handler() return type hint Date not Promise<...>."
      );
    });

    it("reduces generator returns to the bare template", () => {
      const meta = callable("generator", {
        [RETURN_SLOT]: "Generator<number, void, unknown>",
      });
      expect(
        unwrap(sanitizeRootHintForCallable(createSite(), meta, RETURN_SLOT)).hint
      ).to.equal(GENERATOR_TEMPLATE);
    });

    it("rejects generator returns outside the generator protocol", () => {
      const meta = callable("generator", {
        [RETURN_SLOT]: subscript(ARRAY_TEMPLATE, [number]),
      });
      const diagnostic = failure(
        sanitizeRootHintForCallable(createSite(), meta, RETURN_SLOT)
      );
      expect(diagnostic.message).to.equal(
        "$HINT_SITE$ generator callable handler() return type hint Array<number> not one of Generator, Iterator, Iterable."
      );
    });

    it("checks rest parameters element-wise", () => {
      const meta = callable("function", {
        items: subscript(ARRAY_TEMPLATE, [number]),
        pair: tuple([string, number]),
      });
      const site = createSite();

      expect(
        unwrap(sanitizeRootHintForCallable(site, meta, "items", "rest")).hint
      ).to.equal(number);
      expect(
        hintRepr(unwrap(sanitizeRootHintForCallable(site, meta, "pair", "rest")).hint)
      ).to.equal("[string, number]");
    });
  });
});
