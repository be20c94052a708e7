import type { SimulationResults } from "../model/simulation-result";
import type { ResponseReader } from "./response-reader";

/** Anything that yields engine output in order: a Node stream, a fetch body, an embedded engine. */
export type ResponseSource = AsyncIterable<string | Uint8Array>;

/**
 * Pump a chunked source into a reader until it ends, then flush the reader so a
 * final unterminated line is still processed. Bytes are decoded as UTF-8 in
 * streaming mode, so characters split across chunks arrive intact.
 */
export async function readResponseStream(
  source: ResponseSource,
  reader: ResponseReader,
): Promise<SimulationResults> {
  const decoder = new TextDecoder("utf-8");
  for await (const chunk of source) {
    const text = typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
    reader.processResponse(text);
  }
  reader.processResponse(decoder.decode());
  reader.flush();
  return reader.getCompleteReplicates();
}
