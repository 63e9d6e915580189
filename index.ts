/**
 * Privacy Guard - reversible redaction of sensitive text
 *
 * Detects sensitive spans with regex patterns and a local NER model,
 * replaces them with numbered placeholders, and restores the original
 * text exactly from the returned mapping table. All processing is local.
 */

import type {
  AnonymizeResult,
  Detector,
  Diagnostic,
  Logger,
  MappingRecord,
  MappingTable,
  Span,
} from "./guard/types.js";
import { resolveConfig, validateConfig, loadConfig } from "./guard/config.js";
import type { PrivacyGuardConfig } from "./guard/config.js";
import { DetectorFailureError } from "./guard/errors.js";
import { createLogger } from "./guard/logger.js";
import { anonymizeSpans } from "./guard/sanitizer.js";
import { restore, findUnresolvedPlaceholders } from "./guard/restorer.js";
import { RegexDetector } from "./guard/detectors/regex.js";
import { ModelDetector } from "./guard/detectors/model.js";
import type { NerPipeline } from "./guard/detectors/model.js";
import { createWinkPipeline } from "./guard/detectors/wink.js";

export type * from "./guard/types.js";
export type { PrivacyGuardConfig } from "./guard/config.js";
export type { NerPipeline } from "./guard/detectors/model.js";
export type { PatternEntry } from "./guard/detectors/regex.js";
export { DEFAULT_CONFIG, loadConfig, resolveConfig, validateConfig } from "./guard/config.js";
export { ConfigError, DetectorFailureError } from "./guard/errors.js";
export { TextIndex } from "./guard/offsets.js";
export { reconcile } from "./guard/reconciler.js";
export { PlaceholderAllocator, formatPlaceholder } from "./guard/placeholders.js";
export { substitute, anonymizeSpans } from "./guard/sanitizer.js";
export { restore, findUnresolvedPlaceholders } from "./guard/restorer.js";
export { tableToJSON, tableFromJSON } from "./guard/table.js";
export { RegexDetector, DEFAULT_PATTERNS } from "./guard/detectors/regex.js";
export { ModelDetector } from "./guard/detectors/model.js";
export { createWinkPipeline, DEFAULT_ENTITY_LABELS } from "./guard/detectors/wink.js";

// =============================================================================
// Options
// =============================================================================

export type PrivacyGuardOptions = {
  config?: Partial<PrivacyGuardConfig>;
  logger?: Logger;
  /** Replaces the configured detectors; order sets precedence on ties */
  detectors?: Detector[];
  /** Extra NER pipelines by language, added to the built-in English one */
  pipelines?: Record<string, NerPipeline>;
};

// =============================================================================
// Detector Setup
// =============================================================================

function describeDiagnostic(diagnostic: Diagnostic): string {
  switch (diagnostic.kind) {
    case "unsupported_language":
      return `Detector ${diagnostic.detector}: language '${diagnostic.requested}' not supported, used '${diagnostic.fallback}'`;
    case "malformed_span":
      return `Dropped malformed span [${diagnostic.start}, ${diagnostic.end}) labeled '${diagnostic.label}': ${diagnostic.reason}`;
    case "unresolved_placeholder":
      return `Unresolved placeholder passed through: ${diagnostic.placeholder}`;
  }
}

function createDefaultDetectors(
  config: PrivacyGuardConfig,
  pipelines: Record<string, NerPipeline>,
  log: Logger,
): Detector[] {
  const detectors: Detector[] = [];

  // Regex first: on equal starts the earlier detector wins
  if (config.enableRegex) {
    detectors.push(new RegexDetector());
  }
  if (config.enableNer) {
    const english = createWinkPipeline({ labels: config.entityLabels, nameLabel: config.nameLabel });
    detectors.push(
      new ModelDetector({
        pipelines: { en: english, ...pipelines },
        defaultLanguage: Object.hasOwn(pipelines, config.defaultLanguage) ? config.defaultLanguage : "en",
        logger: log,
      }),
    );
  }

  return detectors;
}

// =============================================================================
// PrivacyGuard
// =============================================================================

export class PrivacyGuard {
  readonly config: PrivacyGuardConfig;
  private readonly detectors: Detector[];
  private readonly log: Logger;

  constructor(options: PrivacyGuardOptions = {}) {
    this.config = resolveConfig(options.config);
    validateConfig(this.config);
    this.log = createLogger(options.logger);
    this.detectors =
      options.detectors ?? createDefaultDetectors(this.config, options.pipelines ?? {}, this.log);
  }

  /**
   * Build a guard from the config file or environment
   */
  static fromConfigFile(configPath?: string, logger?: Logger): PrivacyGuard {
    const log = createLogger(logger);
    return new PrivacyGuard({ config: loadConfig(configPath, log), logger });
  }

  /**
   * Anonymize a text.
   *
   * All detectors run concurrently and must all succeed; any failure rejects
   * with DetectorFailureError and no partial output. The returned mapping
   * table belongs to this call only.
   */
  async anonymize(text: string, language: string = this.config.defaultLanguage): Promise<AnonymizeResult> {
    this.log.info(`Anonymizing text (language: ${language}, ${text.length} chars)...`);

    const diagnostics: Diagnostic[] = [];
    const report = (diagnostic: Diagnostic) => {
      diagnostics.push(diagnostic);
    };

    const streams = await Promise.all(
      this.detectors.map((detector) => this.runDetector(detector, text, language, report)),
    );

    const result = anonymizeSpans(text, streams);
    const allDiagnostics = [...diagnostics, ...result.diagnostics];
    for (const diagnostic of result.diagnostics) {
      this.log.warn(describeDiagnostic(diagnostic));
    }

    this.log.info(`Anonymization complete (${result.redactionCount} redactions)`);
    return { ...result, diagnostics: allDiagnostics };
  }

  /**
   * Restore a sanitized text. Placeholder-shaped tokens the table cannot
   * resolve are left in place and logged.
   */
  restore(sanitized: string, mappingTable: MappingTable | MappingRecord): string {
    this.log.info("Restoring text...");
    for (const placeholder of findUnresolvedPlaceholders(sanitized, mappingTable)) {
      this.log.warn(describeDiagnostic({ kind: "unresolved_placeholder", placeholder }));
    }
    return restore(sanitized, mappingTable);
  }

  private async runDetector(
    detector: Detector,
    text: string,
    language: string,
    report: (diagnostic: Diagnostic) => void,
  ): Promise<Span[]> {
    try {
      return await detector.detect(text, language, report);
    } catch (error) {
      this.log.error(`Detector ${detector.name} failed`);
      throw new DetectorFailureError(detector.name, error);
    }
  }
}
