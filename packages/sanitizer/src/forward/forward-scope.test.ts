import { describe, it } from "mocha";
import { expect } from "chai";
import {
  type HintDiagnostic,
  type Result,
  classHint,
  formatDiagnostic,
  primitive,
} from "@hintwarden/hints";
import { ForwardRefRegistry } from "./forward-ref-registry.js";
import { ForwardScope, createForwardScope } from "./forward-scope.js";
import { ModuleRegistry } from "./module-registry.js";
import { ENGINE_TRUST, EVALUATOR_TRUST } from "./trust.js";

class Money {}

const unwrap = <T>(result: Result<T, HintDiagnostic>): T => {
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
};

const createScope = (owner?: object): ForwardScope =>
  unwrap(
    createForwardScope(
      new ForwardRefRegistry(new ModuleRegistry()),
      "app.services",
      { Money: classHint(Money) },
      owner
    )
  );

describe("ForwardScope", () => {
  it("rejects invalid scope names", () => {
    const result = createForwardScope(
      new ForwardRefRegistry(new ModuleRegistry()),
      "app services"
    );
    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.code).to.equal("HWD2001");
  });

  it("resolves builtins and seeded names for any caller", () => {
    const scope = createScope();
    expect(unwrap(scope.lookup("string"))).to.equal(primitive("string"));
    expect(unwrap(scope.lookup("Money"))).to.equal(classHint(Money));
  });

  it("reports a plain miss to untrusted callers", () => {
    const scope = createScope();
    const result = scope.lookup("Invoice");

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.code).to.equal("HWD2002");
    expect(result.error.severity).to.equal("warning");
    expect(formatDiagnostic(result.error)).to.equal(
      'warning HWD2002: Forward scope "app.services" has no name "Invoice". Hint: Only the sanitizer may defer undefined names'
    );
    expect(scope.has("Invoice")).to.equal(false);
  });

  it("ignores tokens that are not trust tokens", () => {
    const scope = createScope();
    const result = scope.lookup("Invoice", Symbol("hintwarden.trust.engine"));
    expect(result.ok).to.equal(false);
  });

  it("fabricates and caches proxies for trusted callers", () => {
    const scope = createScope();
    const first = unwrap(scope.lookup("Invoice", ENGINE_TRUST));
    const second = unwrap(scope.lookup("Invoice", EVALUATOR_TRUST));

    expect(second).to.equal(first);
    expect(first).to.include({
      kind: "forwardRef",
      name: "Invoice",
      scopeName: "app.services",
      refKind: "subscriptable",
    });
    expect(scope.has("Invoice")).to.equal(true);
    expect(unwrap(scope.lookup("Invoice"))).to.equal(first);
  });

  it("validates missing names before fabricating", () => {
    const scope = createScope();
    const result = scope.lookup("not-a-name", ENGINE_TRUST);

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.code).to.equal("HWD2001");
    expect(scope.has("not-a-name")).to.equal(false);
  });

  it("minifies to exactly the resolved names", () => {
    const scope = createScope();
    unwrap(scope.lookup("Money"));
    const invoice = unwrap(scope.lookup("Invoice", ENGINE_TRUST));
    unwrap(scope.lookup("Invoice", ENGINE_TRUST));
    scope.lookup("Ghost");

    const minified = scope.minify();
    expect([...minified.keys()]).to.deep.equal(["Money", "Invoice"]);
    expect(minified.get("Invoice")).to.equal(invoice);
    expect(minified.has("string")).to.equal(false);
  });

  it("passes its owner on to fabricated proxies", () => {
    const owner = {};
    const scope = createScope(owner);
    const ref = unwrap(scope.lookup("Invoice", ENGINE_TRUST));

    expect(scope.owner).to.equal(owner);
    expect(ref.kind === "forwardRef" && ref.cell.owner?.deref()).to.equal(owner);
  });

  it("drops everything on clear", () => {
    const scope = createScope({});
    unwrap(scope.lookup("Money"));
    scope.clear();

    expect(scope.size).to.equal(0);
    expect(scope.owner).to.equal(undefined);
    expect(scope.minify().size).to.equal(0);
  });
});
