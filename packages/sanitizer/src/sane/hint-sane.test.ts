import { describe, it } from "mocha";
import { expect } from "chai";
import {
  ANY_HINT,
  type Hint,
  type TypeParameterHint,
  primitive,
  typeParameter,
} from "@hintwarden/hints";
import {
  HINT_SANE_IGNORABLE,
  createHintSane,
  isHintSaneIgnorable,
  mergeSubstitutionTables,
  withOverriddenName,
  withRecursableHint,
} from "./hint-sane.js";

const T = typeParameter("T");
const U = typeParameter("U");
const string = primitive("string");
const number = primitive("number");
const boolean = primitive("boolean");

describe("HintSane", () => {
  it("marks the ignorable model", () => {
    expect(HINT_SANE_IGNORABLE.hint).to.equal(ANY_HINT);
    expect(HINT_SANE_IGNORABLE.typeArgToHint.size).to.equal(0);
    expect(isHintSaneIgnorable(HINT_SANE_IGNORABLE)).to.equal(true);
    expect(isHintSaneIgnorable(createHintSane(string))).to.equal(false);
  });

  it("lets the child table win over the parent", () => {
    const parent = createHintSane(
      string,
      undefined,
      new Map<TypeParameterHint, Hint>([[T, string]])
    );
    const child = createHintSane(
      number,
      parent,
      new Map<TypeParameterHint, Hint>([
        [T, number],
        [U, boolean],
      ])
    );

    expect(child.typeArgToHint.get(T)).to.equal(number);
    expect(child.typeArgToHint.get(U)).to.equal(boolean);
    expect(parent.typeArgToHint.get(T)).to.equal(string);
  });

  it("keeps parent entries the child does not bind", () => {
    const parent = createHintSane(
      string,
      undefined,
      new Map<TypeParameterHint, Hint>([[T, string]])
    );
    const child = createHintSane(
      number,
      parent,
      new Map<TypeParameterHint, Hint>([[U, boolean]])
    );
    expect([...child.typeArgToHint.keys()]).to.deep.equal([T, U]);
  });

  it("reuses the parent table when the child binds nothing", () => {
    const table = new Map<TypeParameterHint, Hint>([[T, string]]);
    expect(mergeSubstitutionTables(table, undefined)).to.equal(table);
    expect(mergeSubstitutionTables(table, new Map())).to.equal(table);
  });

  it("inherits the recursion guard and applied overrides", () => {
    const parent = withOverriddenName(
      withRecursableHint(createHintSane(string), T),
      "Date"
    );
    const child = createHintSane(number, parent);

    expect(child.recursableHints.has(T)).to.equal(true);
    expect(child.overriddenNames.has("Date")).to.equal(true);
    expect(createHintSane(number).recursableHints.size).to.equal(0);
  });

  it("drops parameters a child table rebinds from the recursion guard", () => {
    const parent = withRecursableHint(withRecursableHint(createHintSane(string), T), U);
    const child = createHintSane(
      number,
      parent,
      new Map<TypeParameterHint, Hint>([[T, boolean]])
    );

    expect(child.recursableHints.has(T)).to.equal(false);
    expect(child.recursableHints.has(U)).to.equal(true);
    expect(parent.recursableHints.has(T)).to.equal(true);
  });
});
