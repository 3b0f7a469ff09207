import fs from "node:fs";

/**
 * Read KEY=VALUE lines into `env`. Blank lines and # comments are skipped,
 * surrounding quotes are stripped. Variables already set are kept.
 */
export function loadDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    if (env[key] == null) env[key] = val;
  }
}

/** Earlier files win, since a file never overrides a variable that is already set. */
export function loadDotEnv(files: string[], env: NodeJS.ProcessEnv = process.env): void {
  for (const fp of files) loadDotEnvFile(fp, env);
}
