import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import { pipeline, type Readable } from "node:stream";
import { createGunzip } from "node:zlib";
import type { Enricher } from "./types.js";
import type { Metric } from "../model/run.js";
import { emptyExtraction } from "../model/run.js";
import { setOwn } from "../model/value.js";
import { ExtractionError } from "../errors.js";
import type { Artifact } from "../model/artifact.js";
import { hasSuffix } from "./shared.js";

// @name: 42
const METRIC_LINE = /@([A-Za-z0-9_]+):\s*(-?\d+)/;
// @name[bucket]: 42
const HISTOGRAM_LINE = /@([A-Za-z0-9_]+)\[([^\]]+)\]:\s*(-?\d+)/;

/**
 * Accumulates metrics from bpftrace-style output, one line at a time.
 *
 * Histogram buckets for one name are collected until a histogram line for a
 * different name shows up; the finished map is then emitted as `<name>_hist`.
 */
export class TraceLogParser {
  private readonly metrics: Metric[] = [];
  private histogramName: string | undefined;
  private buckets: Record<string, number> = {};

  feed(line: string): void {
    const metric = METRIC_LINE.exec(line);
    if (metric) {
      this.metrics.push({ name: metric[1], value: parseCount(metric[1], metric[2]) });
      return;
    }

    const bucket = HISTOGRAM_LINE.exec(line);
    if (bucket) {
      const [, name, key, value] = bucket;
      if (this.histogramName !== undefined && this.histogramName !== name) {
        this.flushHistogram();
      }
      this.histogramName = name;
      setOwn(this.buckets, key, parseCount(name, value));
    }
  }

  /** Flushes the open histogram and returns every metric seen. */
  finish(): Metric[] {
    this.flushHistogram();
    return [...this.metrics];
  }

  private flushHistogram(): void {
    if (this.histogramName === undefined) return;
    this.metrics.push({ name: `${this.histogramName}_hist`, value: this.buckets });
    this.histogramName = undefined;
    this.buckets = {};
  }
}

/** @throws RangeError when the value does not fit a double without rounding */
export function parseCount(name: string, raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`@${name} value ${raw} is outside the safe integer range`);
  }
  return value;
}

/** Plain `.log` files and gzip-compressed `.log.gz` files. */
export const traceLogEnricher: Enricher = {
  name: "trace-log",

  async enrich(artifact, context) {
    if (!hasSuffix(artifact, ".log", ".log.gz")) return emptyExtraction();

    const parser = new TraceLogParser();
    await readLines(artifact, (line) => parser.feed(line));
    const metrics = parser.finish();

    if (metrics.length === 0) {
      context.warn(`No metrics found in trace log ${artifact.path}`);
    }
    return { facts: [], metrics };
  },
};

async function readLines(artifact: Artifact, onLine: (line: string) => void): Promise<void> {
  let failure: unknown;
  const source = createReadStream(artifact.path);
  // pipeline destroys every stage on error
  const input: Readable = artifact.name.endsWith(".gz")
    ? pipeline(source, createGunzip(), (e) => {
        if (e) fail(e);
      })
    : source.on("error", (e: unknown) => fail(e));

  const lines = createInterface({ input, crlfDelay: Infinity });
  function fail(e: unknown): void {
    failure ??= e;
    lines.close();
  }

  try {
    for await (const line of lines) {
      onLine(line);
    }
  } catch (e) {
    if (e instanceof RangeError) {
      throw new ExtractionError(artifact.path, e.message, { cause: e });
    }
    failure ??= e;
  } finally {
    source.destroy();
  }

  if (failure !== undefined) {
    const reason = failure instanceof Error ? failure.message : String(failure);
    throw new ExtractionError(artifact.path, `failed to read log: ${reason}`, { cause: failure });
  }
}

const TOTAL_EXITS = /@total_exits:\s+(\d+)/;

/**
 * `bpftrace_asi_exits.log` from an instrumented run. The last `@total_exits`
 * count becomes metric `asi_exits`, and the run is marked `instrumented`.
 */
export const asiExitsEnricher: Enricher = {
  name: "asi-exits",

  async enrich(artifact, context) {
    if (artifact.name !== "bpftrace_asi_exits.log") return emptyExtraction();

    let exits: number | undefined;
    await readLines(artifact, (line) => {
      const match = TOTAL_EXITS.exec(line);
      if (!match) return;
      if (exits !== undefined) {
        context.warn(`Found more than one @total_exits result in ${artifact.path}`);
      }
      exits = parseCount("total_exits", match[1]);
    });

    if (exits === undefined) return emptyExtraction();
    return {
      facts: [{ name: "instrumented", value: true }],
      metrics: [{ name: "asi_exits", value: exits }],
    };
  },
};
