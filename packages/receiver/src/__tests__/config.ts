// Config resolution checks. Imported by run.ts; runs on import.

import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { argOverrides, envOverrides, loadDotEnvFile, resolveReceiverConfig } from "../config";

const root = fs.mkdtempSync(path.join(os.tmpdir(), "seismolink-config-"));
fs.mkdirSync(path.join(root, "config", "receiver"), { recursive: true });
fs.writeFileSync(path.join(root, "config", "receiver", "default.json"), JSON.stringify({ port: 6000, bind: "127.0.0.1" }));
fs.writeFileSync(path.join(root, "config", "receiver", "lab.json"), JSON.stringify({ port: 7000, drop_on_backward: false }));
fs.writeFileSync(path.join(root, "config", "receiver", "broken.json"), JSON.stringify([1, 2]));

try {
  // --- profile file over schema defaults ---
  const fromFile = resolveReceiverConfig({ env: {}, argv: [], repoRoot: root });
  assert.equal(fromFile.port, 6000);
  assert.equal(fromFile.bind, "127.0.0.1");
  assert.equal(fromFile.drop_on_backward, true);
  console.log("[OK] default profile applied");

  // --- env over file, flags over env ---
  const layered = resolveReceiverConfig({
    env: { SEISMO_CONFIG_PROFILE: "lab", SEISMO_PORT: "7100", SEISMO_BIND: "0.0.0.0" },
    argv: ["--port", "7200", "--ipv6"],
    repoRoot: root,
  });
  assert.equal(layered.port, 7200);
  assert.equal(layered.bind, "0.0.0.0");
  assert.equal(layered.ipv6, true);
  assert.equal(layered.drop_on_backward, false);
  console.log("[OK] env and flags layered over profile");

  // --- missing default profile falls back to schema defaults ---
  const empty = fs.mkdtempSync(path.join(os.tmpdir(), "seismolink-empty-"));
  assert.equal(resolveReceiverConfig({ env: {}, argv: [], repoRoot: empty }).port, 5612);
  fs.rmSync(empty, { recursive: true, force: true });
  console.log("[OK] absent default profile");

  assert.throws(() => resolveReceiverConfig({ env: { SEISMO_CONFIG_PROFILE: "nope" }, repoRoot: root }), /config profile not found/);
  assert.throws(() => resolveReceiverConfig({ env: { SEISMO_CONFIG_PROFILE: "../x" }, repoRoot: root }), /invalid config profile/);
  assert.throws(() => resolveReceiverConfig({ env: { SEISMO_CONFIG_PROFILE: "broken" }, repoRoot: root }), /must be a JSON object/);
  assert.throws(() => resolveReceiverConfig({ env: { SEISMO_PORT: "abc" }, repoRoot: root }));
  console.log("[FAIL-AS-EXPECTED] bad profiles and values");

  assert.deepStrictEqual(envOverrides({ SEISMO_IPV6: "yes", SEISMO_DROP_ON_BACKWARD: "0" }), { ipv6: true, drop_on_backward: false });
  assert.throws(() => envOverrides({ SEISMO_IPV6: "maybe" }), /invalid SEISMO_IPV6/);
  assert.deepStrictEqual(argOverrides(["--no-drop-on-backward", "--bind", "::1"]), { bind: "::1", drop_on_backward: false });
  assert.throws(() => argOverrides(["--port", "--ipv6"]), /missing value for --port/);
  console.log("[OK] env and flag parsing");

  // --- .env loader keeps explicit variables ---
  const envFile = path.join(root, ".env");
  fs.writeFileSync(envFile, ["# comment", "SEISMO_PORT=6100", "SEISMO_BIND='10.1.2.3'", "not a pair", "SEISMO_IPV6=\"false\""].join("\n"));
  const env: NodeJS.ProcessEnv = { SEISMO_PORT: "5000" };
  loadDotEnvFile(envFile, env);
  assert.deepStrictEqual(env, { SEISMO_PORT: "5000", SEISMO_BIND: "10.1.2.3", SEISMO_IPV6: "false" });
  console.log("[OK] .env loading");
} finally {
  fs.rmSync(root, { recursive: true, force: true });
}
