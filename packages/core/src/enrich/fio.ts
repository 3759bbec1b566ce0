import { z } from "zod";
import type { Enricher } from "./types.js";
import type { Metric } from "../model/run.js";
import { emptyExtraction } from "../model/run.js";
import { ExtractionError } from "../errors.js";

const LATENCY_FIELDS = ["lat_ns", "slat_ns", "clat_ns"] as const;

const LatencySchema = z.object({ mean: z.number() });

const FioOutputSchema = z.object({
  jobs: z.array(
    z.object({
      jobname: z.string(),
      read: z.object({
        iops: z.number(),
        lat_ns: LatencySchema,
        slat_ns: LatencySchema,
        clat_ns: LatencySchema,
      }),
    })
  ),
});

const FIO_OUTPUT = /^fio_output_.*\.json$/;

/** Read-side latency and IOPS from `fio --output-format=json+`. */
export const fioEnricher: Enricher = {
  name: "fio",

  async enrich(artifact) {
    if (!FIO_OUTPUT.test(artifact.name)) return emptyExtraction();

    const parsed = FioOutputSchema.safeParse(await artifact.json());
    if (!parsed.success) {
      throw new ExtractionError(artifact.path, `unexpected fio output: ${parsed.error.message}`);
    }

    const metrics: Metric[] = [];
    for (const job of parsed.data.jobs) {
      for (const field of LATENCY_FIELDS) {
        metrics.push({
          name: `fio_${job.jobname}_read_${field}_mean`,
          value: job.read[field].mean,
          unit: "ns",
        });
      }
      metrics.push({ name: `fio_${job.jobname}_read_iops`, value: job.read.iops });
    }
    return { facts: [], metrics };
  },
};

const ELAPSED_NS = /^compile-kernel_elapsed_ns_/;

/** Wall time of a kernel build, one integer of nanoseconds per file. */
export const elapsedNsEnricher: Enricher = {
  name: "elapsed-ns",

  async enrich(artifact) {
    if (!ELAPSED_NS.test(artifact.name)) return emptyExtraction();

    const text = (await artifact.text()).trim();
    if (!/^-?\d+$/.test(text)) {
      throw new ExtractionError(artifact.path, "expected a single integer");
    }
    const ns = Number.parseInt(text, 10);
    if (!Number.isSafeInteger(ns)) {
      throw new ExtractionError(artifact.path, `value ${text} is outside the safe integer range`);
    }
    return {
      facts: [],
      metrics: [{ name: "compile-kernel_elapsed", value: ns, unit: "ns" }],
    };
  },
};
