/**
 * Type descriptors and tagged values: formatting, unification and the
 * checked downcast every operation relies on.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import { ERROR_CODES } from "../../src/types.js";
import {
  concrete,
  formatType,
  generic,
  genericity,
  listOf,
  parseType,
  substitute,
  typesCompatible,
  typesEqual,
  unify,
  type TypeDescriptor,
} from "../../src/values/types.js";
import { DVEC2, F64, RASTER, STRING, U32, U64, Value, ValueTypeError, findValueTag } from "../../src/values/value.js";

describe("values/types", () => {
  it("formats and parses descriptors symmetrically", () => {
    const nested = listOf(listOf(generic("T")));
    expect(formatType(nested)).to.equal("vec<vec<'T>>");
    expect(parseType("vec<vec<'T>>")).to.deep.equal(nested);
    expect(parseType(" f64 ")).to.deep.equal(concrete("f64"));
    expect(parseType("vec<f64")).to.equal(undefined);
    expect(parseType("'")).to.equal(undefined);
    expect(parseType("")).to.equal(undefined);
  });

  it("binds generic parameters consistently while unifying", () => {
    const bindings = new Map<string, TypeDescriptor>();
    expect(unify(listOf(generic("T")), listOf(concrete("f64")), bindings)).to.equal(true);
    expect(formatType(bindings.get("T") ?? concrete("missing"))).to.equal("f64");
    expect(unify(generic("T"), concrete("u32"), bindings)).to.equal(false);
    expect(unify(generic("T"), concrete("f64"), bindings)).to.equal(true);
    expect(substitute(listOf(generic("T")), bindings)).to.deep.equal(listOf(concrete("f64")));
  });

  it("scores genericity by the number of generic slots", () => {
    expect(genericity(concrete("f64"))).to.equal(0);
    expect(genericity(generic("T"))).to.equal(1);
    expect(genericity(listOf(generic("T")))).to.equal(1);
  });

  it("treats generic ports as compatible with anything", () => {
    expect(typesCompatible(generic("T"), concrete("raster"))).to.equal(true);
    expect(typesCompatible(listOf(concrete("f64")), listOf(generic("U")))).to.equal(true);
    expect(typesCompatible(concrete("f64"), concrete("u32"))).to.equal(false);
    expect(typesEqual(listOf(concrete("f64")), listOf(concrete("f64")))).to.equal(true);
  });
});

describe("values/value", () => {
  it("downcasts with the matching tag", () => {
    const value = Value.of(F64, 2.5);
    expect(value.downcast(F64)).to.equal(2.5);
    expect(value.is(F64)).to.equal(true);
    expect(value.is(U32)).to.equal(false);
  });

  it("rejects a mismatched downcast with a type-mismatch error", () => {
    const value = Value.of(STRING, "text");
    let caught: unknown;
    try {
      value.downcast(U32);
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(ValueTypeError);
    if (caught instanceof ValueTypeError) {
      expect(caught.code).to.equal(ERROR_CODES.VALUE_TYPE_MISMATCH);
      expect(caught.message).to.equal("expected u32 but received string");
      expect(caught.details).to.deep.equal({ expected: "u32", actual: "string" });
    }
  });

  it("reports mismatches through tryDowncast without throwing", () => {
    const result = Value.of(U64, 7n).tryDowncast(F64);
    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.details.actual).to.equal("u64");
    }
  });

  it("refuses payloads rejected by the guard", () => {
    expect(() => Value.of(U32, -1)).to.throw(ValueTypeError);
    expect(() => Value.of(U32, 1.5)).to.throw(ValueTypeError);
    expect(() => Value.of(RASTER, { width: 2, height: 2, data: new Float32Array(3) })).to.throw(ValueTypeError);
  });

  it("freezes object payloads shared through fan-out", () => {
    const value = Value.of(DVEC2, { x: 1, y: 2 });
    expect(Object.isFrozen(value.raw)).to.equal(true);
  });

  it("looks up registered tags by descriptor", () => {
    expect(findValueTag(concrete("raster"))).to.equal(RASTER);
    expect(findValueTag(concrete("unknown"))).to.equal(undefined);
  });
});
