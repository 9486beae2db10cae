import { readFile } from "fs/promises";
import { DeployError } from "./deploy";

/**
 * Pulls `user@host` out of an Ansible inventory: the first host key nested
 * under a `hosts:` line and the first `ansible_user:` value.
 */
export function inferRemote(inventory: string): string | undefined {
  let host: string | undefined;
  let user: string | undefined;
  let inHosts = false;

  for (const line of inventory.split(/\r?\n/)) {
    if (!host) {
      if (/hosts:/.test(line)) {
        inHosts = true;
        continue;
      }
      const key = inHosts ? /^\s+([A-Za-z0-9_.-]+):/.exec(line) : null;
      if (key?.[1]) host = key[1];
    }
    if (!user) {
      const match = /ansible_user:\s*["']?([^"'\s#]+)/.exec(line);
      if (match?.[1]) user = match[1];
    }
  }

  return host && user ? `${user}@${host}` : undefined;
}

export async function resolveRemote(remote: string, inventoryPath: string): Promise<string> {
  if (remote !== "auto") return remote;

  let inventory: string;
  try {
    inventory = await readFile(inventoryPath, "utf-8");
  } catch {
    throw new DeployError(`No ${inventoryPath}; please pass --remote user@host`);
  }

  const inferred = inferRemote(inventory);
  if (!inferred) {
    throw new DeployError(`Could not infer remote from ${inventoryPath}; please pass --remote user@host`);
  }
  return inferred;
}
