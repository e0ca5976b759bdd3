import type { Operations } from "@textscope/sdk";

/** Fresh context for one engine run. */
export function createOperations(): Operations {
  return {
    source: "",
    fileIn: "",
    fileOut: "",
    panicked: false,
  };
}
