import { EventEmitter } from 'events';
import { warn } from '../logging/logger.js';
import { errorMessage } from '../errors.js';
import type { LogLine, LogLineLevel, ProgressEvent, ProgressListener, StepResult } from './types.js';

const EVENT = 'progress';

/**
 * Append-only record of one runner's activity: step results, the operator's
 * text log (bounded, oldest lines dropped) and the live event stream.
 * Reads hand out copies.
 */
export class RunLog {
  private results: StepResult[] = [];
  private lines: LogLine[] = [];
  private nextSeq = 1;
  private readonly emitter = new EventEmitter();
  private readonly maxLines: number;

  constructor(maxLines: number = 200) {
    this.maxLines = Math.max(1, Math.floor(maxLines));
    this.emitter.setMaxListeners(0);
  }

  appendResult(result: StepResult): void {
    this.results.push(Object.freeze({ ...result }));
  }

  appendLine(level: LogLineLevel, message: string): LogLine {
    const line: LogLine = Object.freeze({
      seq: this.nextSeq++,
      timestamp: new Date().toISOString(),
      level,
      message,
    });

    this.lines.push(line);
    if (this.lines.length > this.maxLines) {
      this.lines = this.lines.slice(-this.maxLines);
    }
    return line;
  }

  getResults(): StepResult[] {
    return this.results.map((r) => ({ ...r }));
  }

  /** Lines with `seq` greater than `afterSeq` */
  getLines(afterSeq: number = 0): LogLine[] {
    return this.lines.filter((l) => l.seq > afterSeq).map((l) => ({ ...l }));
  }

  clearLines(): void {
    this.lines = [];
  }

  clear(): void {
    this.results = [];
    this.lines = [];
  }

  emit(event: ProgressEvent): void {
    this.emitter.emit(EVENT, event);
  }

  /** A throwing listener is logged and never reaches the emitting run */
  subscribe(listener: ProgressListener): () => void {
    const guarded: ProgressListener = (event) => {
      try {
        listener(event);
      } catch (error) {
        warn(`Progress listener failed on ${event.type}: ${errorMessage(error)}`, 'RunLog');
      }
    };
    this.emitter.on(EVENT, guarded);
    return () => {
      this.emitter.off(EVENT, guarded);
    };
  }
}
