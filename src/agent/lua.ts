// Serializes plain values into Lua table constructors for /silent-command.

const LUA_KEYWORDS = new Set([
  "and", "break", "do", "else", "elseif", "end", "false", "for", "function", "goto", "if", "in",
  "local", "nil", "not", "or", "repeat", "return", "then", "true", "until", "while",
]);

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export class LuaExpr {
  constructor(readonly code: string) {}
}

// Raw Lua emitted verbatim, e.g. luaExpr("defines.direction.east").
export function luaExpr(code: string): LuaExpr {
  return new LuaExpr(code);
}

export type LuaValue =
  | null
  | undefined
  | boolean
  | number
  | string
  | LuaExpr
  | readonly LuaValue[]
  | { readonly [key: string]: LuaValue };

export function luaString(value: string): string {
  let out = "\"";
  for (const char of value) {
    switch (char) {
      case "\\": out += "\\\\"; break;
      case "\"": out += "\\\""; break;
      case "\n": out += "\\n"; break;
      case "\r": out += "\\r"; break;
      case "\t": out += "\\t"; break;
      default: {
        const code = char.codePointAt(0) ?? 0;
        // Decimal escapes are greedy, so always pad to three digits.
        out += code < 0x20 || code === 0x7f ? `\\${code.toString().padStart(3, "0")}` : char;
      }
    }
  }
  return out + "\"";
}

function luaKey(key: string): string {
  return IDENTIFIER.test(key) && !LUA_KEYWORDS.has(key) ? key : `[${luaString(key)}]`;
}

export function toLua(value: LuaValue): string {
  if (value === null || value === undefined) return "nil";
  if (value instanceof LuaExpr) return value.code;

  switch (typeof value) {
    case "boolean":
      return value ? "true" : "false";
    case "number":
      if (!Number.isFinite(value)) {
        throw new Error(`Cannot serialize ${value} to Lua`);
      }
      return String(value);
    case "string":
      return luaString(value);
  }

  if (isLuaArray(value)) {
    return `{${value.map(toLua).join(", ")}}`;
  }

  const fields = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .map(([key, member]) => `${luaKey(key)} = ${toLua(member)}`);
  return `{${fields.join(", ")}}`;
}

function isLuaArray(value: readonly LuaValue[] | { readonly [key: string]: LuaValue }): value is readonly LuaValue[] {
  return Array.isArray(value);
}
