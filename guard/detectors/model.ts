/**
 * Model-based detector
 *
 * Routes text to a per-language NER pipeline. A language without a
 * pipeline falls back to the default language with a warning; it never
 * fails the call.
 */

import type { Detector, Diagnostic, Logger, OffsetUnit, RawDetection, Span } from "../types.js";
import { TextIndex } from "../offsets.js";
import { toSpans } from "./normalize.js";

/**
 * A named-entity recognizer for one language.
 * `unit` names the offset unit its detections are reported in.
 */
export type NerPipeline = {
  unit: OffsetUnit;
  run(text: string): RawDetection[] | Promise<RawDetection[]>;
};

export type ModelDetectorOptions = {
  pipelines: Record<string, NerPipeline>;
  defaultLanguage?: string;
  name?: string;
  logger?: Logger;
};

export class ModelDetector implements Detector {
  readonly kind = "model";
  readonly name: string;
  private readonly pipelines: Map<string, NerPipeline>;
  private readonly defaultLanguage: string;
  private readonly log: Logger | undefined;

  constructor(options: ModelDetectorOptions) {
    this.name = options.name ?? "ner";
    this.pipelines = new Map(Object.entries(options.pipelines));
    this.defaultLanguage = options.defaultLanguage ?? "en";
    this.log = options.logger;

    if (!this.pipelines.has(this.defaultLanguage)) {
      throw new Error(`No NER pipeline for default language "${this.defaultLanguage}"`);
    }
  }

  get languages(): string[] {
    return [...this.pipelines.keys()];
  }

  async detect(text: string, language: string, report?: (diagnostic: Diagnostic) => void): Promise<Span[]> {
    let pipeline = this.pipelines.get(language);
    if (!pipeline) {
      this.log?.warn(`Language '${language}' not supported. Defaulting to '${this.defaultLanguage}'.`);
      report?.({
        kind: "unsupported_language",
        detector: this.name,
        requested: language,
        fallback: this.defaultLanguage,
      });
      pipeline = this.pipelines.get(this.defaultLanguage);
    }
    if (!pipeline) return [];

    const detections = await pipeline.run(text);
    return toSpans(new TextIndex(text), detections, pipeline.unit);
  }
}
