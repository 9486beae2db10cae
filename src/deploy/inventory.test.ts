import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { DeployError } from "./deploy";
import { inferRemote, resolveRemote } from "./inventory";

const INVENTORY = `all:
  hosts:
    factorio-1:
      ansible_host: 192.0.2.10
    factorio-2:
      ansible_host: 192.0.2.11
  vars:
    ansible_user: ops # deploy account
    data_dir: /srv/factorio
`;

describe("inferRemote", () => {
  test("should take the first host and the ansible user", () => {
    expect(inferRemote(INVENTORY)).toBe("ops@factorio-1");
  });

  test("should accept a quoted user", () => {
    expect(inferRemote("hosts:\n  box.lan:\nansible_user: \"deploy\"\n")).toBe("deploy@box.lan");
  });

  test("should give up without a user", () => {
    expect(inferRemote("all:\n  hosts:\n    factorio-1:\n")).toBeUndefined();
  });

  test("should give up without a hosts section", () => {
    expect(inferRemote("ansible_user: ops\n")).toBeUndefined();
  });
});

describe("resolveRemote", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "inventory-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("should pass an explicit remote through", async () => {
    await expect(resolveRemote("ops@host", join(dir, "missing.yml"))).resolves.toBe("ops@host");
  });

  test("should read the inventory for auto", async () => {
    await writeFile(join(dir, "inventory.yml"), INVENTORY);
    await expect(resolveRemote("auto", join(dir, "inventory.yml"))).resolves.toBe("ops@factorio-1");
  });

  test("should explain a missing inventory", async () => {
    const path = join(dir, "inventory.yml");
    await expect(resolveRemote("auto", path)).rejects.toThrow(`No ${path}; please pass --remote user@host`);
  });

  test("should fail with a DeployError when the inventory names no user", async () => {
    const path = join(dir, "inventory.yml");
    await writeFile(path, "all:\n  hosts:\n    factorio-1:\n");

    const attempt = resolveRemote("auto", path);
    await expect(attempt).rejects.toBeInstanceOf(DeployError);
    await expect(attempt).rejects.toThrow(`Could not infer remote from ${path}; please pass --remote user@host`);
  });
});
