import { AGENT_FUNCTIONS } from "./schemas";

export interface InterfaceReport {
  luaFunctions: string[];
  missingInLua: string[];
  missingInTs: string[];
}

/**
 * Function names registered by `remote.add_interface("<name>", { ... })` in a
 * control.lua source. Returns undefined when the interface is not registered.
 */
export function extractInterfaceFunctions(luaSource: string, interfaceName: string): string[] | undefined {
  const escaped = interfaceName.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const start = new RegExp(`remote\\.add_interface\\s*\\(\\s*["']${escaped}["']\\s*,\\s*\\{`).exec(luaSource);
  if (!start) return undefined;

  const body = luaSource.slice(start.index + start[0].length);
  const end = body.search(/^\}\s*\)/m);
  const table = end === -1 ? body : body.slice(0, end);

  const names: string[] = [];
  for (const match of table.matchAll(/^[ \t]*([A-Za-z_][A-Za-z0-9_]*)\s*=\s*function\b/gm)) {
    if (match[1]) names.push(match[1]);
  }
  return names;
}

export function compareInterface(luaSource: string, interfaceName: string): InterfaceReport {
  const luaFunctions = extractInterfaceFunctions(luaSource, interfaceName);
  if (!luaFunctions) {
    throw new Error(`remote.add_interface("${interfaceName}", ...) not found`);
  }

  const ts = new Set<string>(AGENT_FUNCTIONS);
  const lua = new Set(luaFunctions);
  return {
    luaFunctions,
    missingInLua: AGENT_FUNCTIONS.filter((fn) => !lua.has(fn)),
    missingInTs: luaFunctions.filter((fn) => !ts.has(fn)),
  };
}
