/**
 * Shared mutable state for one engine run.
 * Created fresh at run start, written by validate phases, discarded after the report.
 */
export interface Operations {
  /** Full input text. Empty until a command resolves it. */
  source: string;

  /** Path the source was loaded from. Empty if unset. */
  fileIn: string;

  /** Path the report should be written to. Empty means "return it". */
  fileOut: string;

  /** Set on the first validation failure; skips every later phase. */
  panicked: boolean;
}
