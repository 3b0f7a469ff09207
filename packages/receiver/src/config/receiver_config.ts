// seismolink/packages/receiver/src/config/receiver_config.ts
//
// Precedence, lowest first:
//   schema defaults < config/receiver/<profile>.json < SEISMO_* env < CLI flags

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { parseReceiverConfigV1, type ReceiverConfigV1 } from "@seismolink/contracts";

import { loadDotEnv } from "./dotenv";
import { findRepoRoot } from "./repo_root";

export const PROFILE_DIR = path.join("config", "receiver");

export type ConfigSources = {
  env?: NodeJS.ProcessEnv;
  argv?: string[];
  /** Directory holding config/receiver; discovered from this file when omitted. */
  repoRoot?: string;
};

type Overrides = Record<string, unknown>;

function isObj(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function parseBool(v: string, name: string): boolean {
  const s = v.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(s)) return true;
  if (["0", "false", "no", "off"].includes(s)) return false;
  throw new Error(`invalid ${name}: ${v}`);
}

// Non-numeric text becomes NaN and is refused by the schema.
function parseNum(v: string): number {
  return v.trim() === "" ? NaN : Number(v);
}

export function resolveRepoRoot(env: NodeJS.ProcessEnv = process.env): string {
  if (env.SEISMO_REPO_ROOT) return path.resolve(env.SEISMO_REPO_ROOT);
  const here = path.dirname(fileURLToPath(import.meta.url));
  return findRepoRoot(here, PROFILE_DIR) ?? findRepoRoot(process.cwd(), PROFILE_DIR) ?? path.resolve(process.cwd());
}

/**
 * Profile "default" may be absent; any other named profile must exist.
 */
export function readProfile(repoRoot: string, profile: string): Overrides {
  if (!/^[A-Za-z0-9_-]+$/.test(profile)) throw new Error(`invalid config profile: ${profile}`);
  const fp = path.join(repoRoot, PROFILE_DIR, `${profile}.json`);
  if (!fs.existsSync(fp)) {
    if (profile === "default") return {};
    throw new Error(`config profile not found: ${fp}`);
  }
  const parsed: unknown = JSON.parse(fs.readFileSync(fp, "utf8"));
  if (!isObj(parsed)) throw new Error(`config profile must be a JSON object: ${fp}`);
  return parsed;
}

export function envOverrides(env: NodeJS.ProcessEnv): Overrides {
  const out: Overrides = {};
  if (env.SEISMO_BIND) out.bind = env.SEISMO_BIND;
  if (env.SEISMO_PORT) out.port = parseNum(env.SEISMO_PORT);
  if (env.SEISMO_IPV6) out.ipv6 = parseBool(env.SEISMO_IPV6, "SEISMO_IPV6");
  if (env.SEISMO_DROP_ON_BACKWARD) out.drop_on_backward = parseBool(env.SEISMO_DROP_ON_BACKWARD, "SEISMO_DROP_ON_BACKWARD");
  if (env.SEISMO_RECV_BUFFER_BYTES) out.recv_buffer_bytes = parseNum(env.SEISMO_RECV_BUFFER_BYTES);
  if (env.SEISMO_MAX_PENDING) out.max_pending = parseNum(env.SEISMO_MAX_PENDING);
  return out;
}

export function argOverrides(argv: string[]): Overrides {
  const get = (k: string): string | undefined => {
    const idx = argv.indexOf(`--${k}`);
    if (idx === -1) return undefined;
    const v = argv[idx + 1];
    if (v === undefined || v.startsWith("--")) throw new Error(`missing value for --${k}`);
    return v;
  };
  const out: Overrides = {};
  const bind = get("bind");
  if (bind !== undefined) out.bind = bind;
  const port = get("port");
  if (port !== undefined) out.port = parseNum(port);
  const recv = get("recv-buffer-bytes");
  if (recv !== undefined) out.recv_buffer_bytes = parseNum(recv);
  const pending = get("max-pending");
  if (pending !== undefined) out.max_pending = parseNum(pending);
  if (argv.includes("--ipv6")) out.ipv6 = true;
  if (argv.includes("--no-drop-on-backward")) out.drop_on_backward = false;
  return out;
}

export function resolveReceiverConfig(sources: ConfigSources = {}): ReceiverConfigV1 {
  const env = sources.env ?? process.env;
  const argv = sources.argv ?? [];
  const repoRoot = sources.repoRoot ?? resolveRepoRoot(env);
  const profile = env.SEISMO_CONFIG_PROFILE ?? "default";

  return parseReceiverConfigV1({
    ...readProfile(repoRoot, profile),
    ...envOverrides(env),
    ...argOverrides(argv),
  });
}

/** Load `.env` from the repo root and then from `appDir`, then resolve. */
export function loadReceiverConfig(appDir: string, argv: string[] = process.argv.slice(2)): ReceiverConfigV1 {
  const repoRoot = resolveRepoRoot();
  loadDotEnv([path.join(repoRoot, ".env"), path.join(appDir, ".env")]);
  return resolveReceiverConfig({ env: process.env, argv, repoRoot });
}
