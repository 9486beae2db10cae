import { describe, test, expect } from "vitest";
import { luaExpr, luaString, toLua } from "./lua";

describe("toLua", () => {
  test("should serialize scalars", () => {
    expect(toLua(null)).toBe("nil");
    expect(toLua(true)).toBe("true");
    expect(toLua(false)).toBe("false");
    expect(toLua(-2.5)).toBe("-2.5");
    expect(toLua("iron-plate")).toBe("\"iron-plate\"");
  });

  test("should refuse numbers Lua cannot read back", () => {
    expect(() => toLua(Number.NaN)).toThrow("Cannot serialize NaN to Lua");
    expect(() => toLua(Infinity)).toThrow("Cannot serialize Infinity to Lua");
  });

  test("should escape quotes, backslashes and control characters", () => {
    expect(luaString("say \"hi\"\\")).toBe("\"say \\\"hi\\\"\\\\\"");
    expect(luaString("a\nb\tc")).toBe("\"a\\nb\\tc\"");
    expect(luaString("\u0001")).toBe("\"\\001\"");
    expect(luaString("\u00007")).toBe("\"\\0007\"");
  });

  test("should turn arrays into sequences", () => {
    expect(toLua([[-1, -2], [3, 4]])).toBe("{{-1, -2}, {3, 4}}");
    expect(toLua([])).toBe("{}");
  });

  test("should use bare keys only for identifiers that are not keywords", () => {
    expect(toLua({ radius: 32, "inner-name": "belt", end: 1 })).toBe(
      "{radius = 32, [\"inner-name\"] = \"belt\", [\"end\"] = 1}"
    );
  });

  test("should skip undefined members", () => {
    expect(toLua({ zoom: undefined, gui: false })).toBe("{gui = false}");
  });

  test("should emit raw expressions verbatim", () => {
    expect(toLua({ direction: luaExpr("defines.direction.east") })).toBe("{direction = defines.direction.east}");
  });
});
