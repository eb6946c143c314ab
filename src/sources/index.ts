// src/sources/index.ts

import { PushSampleSource } from "./pushSampleSource.js";
import { ReplaySampleSource } from "./replaySampleSource.js";
import type { SampleSource, SourceSpec } from "./sampleSource.js";
import { SyntheticSampleSource } from "./syntheticSampleSource.js";

export * from "./sampleSource.js";
export { PushSampleSource } from "./pushSampleSource.js";
export { ReplaySampleSource } from "./replaySampleSource.js";
export { SyntheticSampleSource } from "./syntheticSampleSource.js";

/**
 * Build a fresh source for one dispatch. Sources are not restartable, so
 * every start of a signal calls this again.
 */
export function createSampleSource(spec: SourceSpec): SampleSource {
    switch (spec.kind) {
        case "synthetic":
            return new SyntheticSampleSource(spec);
        case "replay":
            return new ReplaySampleSource(spec);
        case "push":
            return new PushSampleSource(spec.capacity);
    }
}
