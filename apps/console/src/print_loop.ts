// Terminal rendering of the accepted-sample stream.

import type { ReceiveOneSource, ReceiverLogger } from "@seismolink/receiver";
import type { Sample } from "@seismolink/sample";

import { describeOrientation, MedianWindow } from "./orientation";

/** ANSI: clear the whole line, then return the cursor to column 0. */
export const CLEAR_LINE = "\x1b[2K\r";

export type TextSink = {
  write(chunk: string): unknown;
};

export type PrintMode = "samples" | "orientation";

export type PrintLoopOptions = {
  out: TextSink;
  log: ReceiverLogger;
  mode?: PrintMode;
  /** Plain newline-separated output when the terminal has no ANSI support. */
  plain?: boolean;
};

/**
 * Read until the source reports `closed`. Each accepted sample overwrites the
 * current line. Suppressed samples are skipped and rejected datagrams are
 * logged. Returns the number of lines written.
 */
export async function printLoop(source: ReceiveOneSource, opts: PrintLoopOptions): Promise<number> {
  const { out, log } = opts;
  const plain = opts.plain ?? process.platform === "win32";
  const window = opts.mode === "orientation" ? new MedianWindow() : null;

  const render = (s: Sample): string => (window ? describeOrientation(window.push(s)) : s.toString());

  if (!plain) out.write("Awaiting initial measurement...");

  let lines = 0;
  for (;;) {
    const r = await source.receiveOne();
    if (r.status === "closed") return lines;
    if (r.status === "rejected") {
      log.warn({ code: r.error.code }, r.error.message);
      continue;
    }
    if (r.status === "suppressed") continue;

    out.write(plain ? `${render(r.sample)}\n` : `${CLEAR_LINE}${render(r.sample)}`);
    lines++;
  }
}
