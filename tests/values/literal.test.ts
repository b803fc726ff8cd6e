/**
 * Literal codec used for port fields and JSON descriptors, plus the value
 * fingerprints feeding the version stamps.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import { fingerprintValue } from "../../src/values/fingerprint.js";
import {
  LiteralError,
  defaultValueFor,
  displayValue,
  formatPrimitiveLiteral,
  parseColorLiteral,
  parsePrimitiveLiteral,
} from "../../src/values/literal.js";
import { concrete, generic, listOf } from "../../src/values/types.js";
import { BOOL, COLOR, DVEC2, F64, RASTER, STRING, U32, U64, VEC_F64, Value } from "../../src/values/value.js";

describe("values/literal", () => {
  it("parses primitive literals against the port type", () => {
    expect(parsePrimitiveLiteral("2.5", concrete("f64"))?.downcast(F64)).to.equal(2.5);
    expect(parsePrimitiveLiteral("-1e3", concrete("f64"))?.downcast(F64)).to.equal(-1000);
    expect(parsePrimitiveLiteral("42", concrete("u32"))?.downcast(U32)).to.equal(42);
    expect(parsePrimitiveLiteral("18446744073709551615", concrete("u64"))?.downcast(U64)).to.equal(18446744073709551615n);
    expect(parsePrimitiveLiteral("true", concrete("bool"))?.downcast(BOOL)).to.equal(true);
    expect(parsePrimitiveLiteral("raw text", concrete("string"))?.downcast(STRING)).to.equal("raw text");
    expect(parsePrimitiveLiteral("1.5, -2", concrete("dvec2"))?.downcast(DVEC2)).to.deep.equal({ x: 1.5, y: -2 });
  });

  it("returns undefined for text that does not fit the type", () => {
    expect(parsePrimitiveLiteral("abc", concrete("f64"))).to.equal(undefined);
    expect(parsePrimitiveLiteral("4294967296", concrete("u32"))).to.equal(undefined);
    expect(parsePrimitiveLiteral("-3", concrete("u32"))).to.equal(undefined);
    expect(parsePrimitiveLiteral("yes", concrete("bool"))).to.equal(undefined);
    expect(parsePrimitiveLiteral("1", concrete("raster"))).to.equal(undefined);
    expect(parsePrimitiveLiteral("1", generic("T"))).to.equal(undefined);
  });

  it("parses hex colours and named constants", () => {
    expect(parseColorLiteral('"#ff0000"')).to.deep.equal({ r: 1, g: 0, b: 0, a: 1 });
    expect(parseColorLiteral('"00ff0000"')).to.deep.equal({ r: 0, g: 1, b: 0, a: 0 });
    expect(parseColorLiteral("Color::BLUE")).to.deep.equal({ r: 0, g: 0, b: 1, a: 1 });
    expect(parseColorLiteral("Color::PURPLE")).to.equal(undefined);
    expect(parseColorLiteral('"#fff"')).to.equal(undefined);
  });

  it("renders primitives with their type suffix", () => {
    expect(formatPrimitiveLiteral(Value.none())).to.equal("()");
    expect(formatPrimitiveLiteral(Value.of(STRING, "hi"))).to.equal('"hi"');
    expect(formatPrimitiveLiteral(Value.of(U32, 5))).to.equal("5_u32");
    expect(formatPrimitiveLiteral(Value.of(U64, 5n))).to.equal("5_u64");
    expect(formatPrimitiveLiteral(Value.of(F64, 2.5))).to.equal("2.5_f64");
    expect(formatPrimitiveLiteral(Value.of(BOOL, true))).to.equal("true");
    expect(formatPrimitiveLiteral(Value.of(COLOR, { r: 1, g: 0, b: 0, a: 1 }))).to.equal("Color #ff0000ff");
  });

  it("refuses to render non-primitive values", () => {
    const raster = Value.of(RASTER, { width: 1, height: 1, data: new Float32Array([0.5]) });
    expect(() => formatPrimitiveLiteral(raster)).to.throw(LiteralError, "cannot render raster as a primitive literal");
    expect(() => displayValue(raster)).to.throw(LiteralError, "cannot display raster");
  });

  it("displays scalars without suffixes", () => {
    expect(displayValue(Value.of(F64, 13))).to.equal("13");
    expect(displayValue(Value.of(U64, 7n))).to.equal("7");
    expect(displayValue(Value.of(BOOL, false))).to.equal("false");
  });

  it("provides port defaults per type", () => {
    expect(defaultValueFor(concrete("f64"))?.downcast(F64)).to.equal(0);
    expect(defaultValueFor(listOf(concrete("f64")))?.downcast(VEC_F64)).to.deep.equal([]);
    expect(defaultValueFor(concrete("color"))?.downcast(COLOR)).to.deep.equal({ r: 0, g: 0, b: 0, a: 0 });
    expect(defaultValueFor(concrete("raster"))?.downcast(RASTER).width).to.equal(0);
    expect(defaultValueFor(generic("T"))).to.equal(undefined);
  });
});

describe("values/fingerprint", () => {
  it("is stable for equal payloads and sensitive to the type", () => {
    expect(fingerprintValue(Value.of(F64, 5))).to.equal(fingerprintValue(Value.of(F64, 5)));
    expect(fingerprintValue(Value.of(F64, 5))).to.not.equal(fingerprintValue(Value.of(U32, 5)));
    expect(fingerprintValue(Value.of(F64, 5))).to.have.length(24);
  });

  it("distinguishes signed zeros and collapses NaNs", () => {
    expect(fingerprintValue(Value.of(F64, 0))).to.not.equal(fingerprintValue(Value.of(F64, -0)));
    expect(fingerprintValue(Value.of(F64, Number.NaN))).to.equal(fingerprintValue(Value.of(F64, 0 / 0)));
  });

  it("ignores key order and hashes typed arrays by content", () => {
    expect(fingerprintValue(Value.of(DVEC2, { x: 1, y: 2 }))).to.equal(fingerprintValue(Value.of(DVEC2, { y: 2, x: 1 })));
    const a = Value.of(RASTER, { width: 2, height: 1, data: new Float32Array([1, 2]) });
    const b = Value.of(RASTER, { width: 2, height: 1, data: new Float32Array([1, 2]) });
    const c = Value.of(RASTER, { width: 2, height: 1, data: new Float32Array([1, 3]) });
    expect(fingerprintValue(a)).to.equal(fingerprintValue(b));
    expect(fingerprintValue(a)).to.not.equal(fingerprintValue(c));
  });
});
