import { DEFAULT_ERROR_POLICY, DEFAULT_START_STEP, LINE_TERMINATOR } from "../constants";
import { EngineError, FormatError, ProtocolViolationError } from "../errors";
import { OutputDatum } from "../model/output-datum";
import { SimulationResult, SimulationResultBuilder, SimulationResults } from "../model/simulation-result";
import type { ReplicateId } from "../types/result-types";
import { EngineResponse, LineParser, parseEngineResponse } from "./engine-response";

/** Called synchronously each time a replicate completes, with the running count. */
export type ReplicateObserver = (completedCount: number) => void;

/** Called with the step reached, counted from the simulation's first step. */
export type ProgressObserver = (step: number) => void;

/**
 * What happens to a line that is malformed or breaks replicate bookkeeping.
 * "throw" rethrows from processResponse; "skip" logs and moves on.
 */
export type ErrorPolicy = "throw" | "skip";

export interface ResponseReaderOptions {
  onProgress?: ProgressObserver;
  /** First step of the simulation, subtracted from reported progress. */
  startStep?: number;
  errorPolicy?: ErrorPolicy;
  /** Decoder for a single line. Defaults to the engine's own wire format. */
  parseLine?: LineParser;
}

/**
 * Rebuilds per-replicate results from the engine's response stream.
 *
 * Chunks may split lines anywhere. Text after the last line terminator is held
 * in a carry-over buffer until its terminator arrives (or flush() is called).
 * Replicates may interleave; within a replicate, arrival order is kept. Each
 * completed replicate is appended to the results in completion order.
 *
 * When a line fails, it is dropped and any complete lines after it stay queued;
 * the next processResponse() or flush() call picks them up. Not re-entrant: the
 * observers must not call back into the reader.
 */
export class ResponseReader {
  private buffer = "";
  private readonly pending: string[] = [];
  private readonly inProgress = new Map<ReplicateId, SimulationResultBuilder>();
  private readonly finalized = new Set<ReplicateId>();
  private readonly completeReplicates: SimulationResult[] = [];
  private completedCount = 0;
  private dispatching = false;

  private readonly onReplicate: ReplicateObserver;
  private readonly onProgress: ProgressObserver;
  private readonly startStep: number;
  private readonly errorPolicy: ErrorPolicy;
  private readonly parseLine: LineParser;

  constructor(onReplicate: ReplicateObserver, options: ResponseReaderOptions = {}) {
    this.onReplicate = onReplicate;
    this.onProgress = options.onProgress ?? (() => {});
    this.startStep = options.startStep ?? DEFAULT_START_STEP;
    this.errorPolicy = options.errorPolicy ?? DEFAULT_ERROR_POLICY;
    this.parseLine = options.parseLine ?? parseEngineResponse;
  }

  /** Feed the next chunk of engine output. Zero-length chunks are allowed. */
  processResponse(text: string): void {
    this.assertNotDispatching();
    this.buffer += text;
    const lines = this.buffer.split(LINE_TERMINATOR);
    // Last element is either empty (text ended with a terminator) or a partial line
    this.buffer = lines.pop() ?? "";
    for (const line of lines) this.pending.push(line);
    this.drain();
  }

  /** Treat the carry-over text as a complete line, for streams that end without a terminator. */
  flush(): void {
    this.assertNotDispatching();
    const remaining = this.buffer;
    this.buffer = "";
    if (remaining !== "") this.pending.push(remaining);
    this.drain();
  }

  /** Text received after the last line terminator, not yet processed. */
  getBuffer(): string {
    return this.buffer;
  }

  /** Snapshot of the replicates completed so far, in completion order. */
  getCompleteReplicates(): SimulationResults {
    return Object.freeze([...this.completeReplicates]);
  }

  getCompletedCount(): number {
    return this.completedCount;
  }

  private assertNotDispatching(): void {
    if (this.dispatching) {
      throw new Error("ResponseReader cannot be called from one of its own observers");
    }
  }

  private drain(): void {
    this.dispatching = true;
    try {
      let line = this.pending.shift();
      while (line !== undefined) {
        this.processLine(line.trim());
        line = this.pending.shift();
      }
    } finally {
      this.dispatching = false;
    }
  }

  private processLine(line: string): void {
    if (line === "") return;
    try {
      const response = this.parseLine(line);
      if (response !== null) this.dispatch(response);
    } catch (err) {
      if (this.errorPolicy === "skip" && (err instanceof FormatError || err instanceof ProtocolViolationError)) {
        console.warn(`Skipping engine response line: ${err.message}`);
        return;
      }
      throw err;
    }
  }

  private dispatch(response: EngineResponse): void {
    switch (response.type) {
      case "datum":
        this.addDatum(response.replicate, new OutputDatum(response.datum.target, response.datum.attributes));
        break;
      case "end":
        this.endReplicate(response.replicate);
        break;
      case "progress":
        this.onProgress(response.steps - this.startStep);
        break;
      case "error":
        throw new EngineError(response.message);
    }
  }

  private addDatum(replicate: ReplicateId, datum: OutputDatum): void {
    if (this.finalized.has(replicate)) {
      throw new ProtocolViolationError(`Datum received for completed replicate ${replicate}`, replicate);
    }
    let builder = this.inProgress.get(replicate);
    if (builder === undefined) {
      builder = new SimulationResultBuilder();
      this.inProgress.set(replicate, builder);
    }
    builder.add(datum);
  }

  private endReplicate(replicate: ReplicateId): void {
    const builder = this.inProgress.get(replicate);
    if (builder === undefined) {
      const reason = this.finalized.has(replicate) ? "already completed" : "never started";
      throw new ProtocolViolationError(`End received for replicate ${replicate} which was ${reason}`, replicate);
    }
    this.inProgress.delete(replicate);
    this.finalized.add(replicate);
    this.completeReplicates.push(builder.build());
    this.completedCount++;
    this.onReplicate(this.completedCount);
  }
}
