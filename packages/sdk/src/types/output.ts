/**
 * Tri-state result of one command phase.
 *
 * - ok: success, rendered as `[SUCCESS]: <message>`
 * - err: failure, rendered as `[ERROR]: <message>`
 * - empty: nothing to report
 *
 * A result whose message is empty is never rendered, whatever its status.
 */

export type OutputStatus = "ok" | "err" | "empty";

export interface Output {
  readonly status: OutputStatus;
  readonly message: string;
}

export const Output = {
  ok(message = ""): Output {
    return { status: "ok", message };
  },

  err(message: string): Output {
    return { status: "err", message };
  },

  empty(): Output {
    return { status: "empty", message: "" };
  },
} as const;

export function isErr(output: Output): boolean {
  return output.status === "err";
}

/** Whether the output carries text that belongs in the report. */
export function isReportable(output: Output): boolean {
  return output.status !== "empty" && output.message.length > 0;
}
