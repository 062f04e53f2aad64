/**
 * Validator Agent
 *
 * Optional model-backed review of a written schematic, and interpretation
 * of ERC and structural findings into repair suggestions for the Architect.
 * Without an LLM client both operations return no findings.
 *
 * @module agents/validator-agent
 */

import { summarizeErc } from '../kicad/erc.js';
import {
  complianceReviewPrompt,
  ercInterpretationPrompt,
  validateIssuesResponse,
  validateSuggestionsResponse,
} from '../llm/prompts/validator-prompts.js';
import type { LLMClient } from '../llm/types.js';
import { formatIssue } from '../validation/structural-validator.js';
import { log, Logger } from '../utils/logger.js';
import type { ErcReport, ValidationIssue } from '../types/index.js';

const validatorAgentLogger: Logger = log.child({ service: 'validator-agent' });

export const NON_JSON_REVIEW_ISSUE = 'LLM returned non-JSON response for KiCad validation.';

export interface ValidatorAgentOptions {
  llm?: LLMClient;
}

export class ValidatorAgent {
  private readonly llm?: LLMClient;

  constructor(options: ValidatorAgentOptions = {}) {
    this.llm = options.llm;
  }

  get usesLlm(): boolean {
    return this.llm !== undefined;
  }

  /**
   * KiCad 9 compliance and layout review of schematic text
   */
  async reviewSchematic(schematicText: string): Promise<string[]> {
    if (!this.llm) return [];

    const result = await this.llm.callLLMWithValidation(
      complianceReviewPrompt(schematicText),
      validateIssuesResponse,
      { temperature: 0, maxTokens: 1500 }
    );

    if (!result.success || !result.data) {
      validatorAgentLogger.warn('Compliance review reply was not usable', {
        attempts: result.attempts,
        error: result.error,
      });
      return [NON_JSON_REVIEW_ISSUE];
    }

    validatorAgentLogger.info('Compliance review complete', { issueCount: result.data.length });
    return result.data;
  }

  /**
   * Repair suggestions from ERC output and structural issues. Nothing to
   * interpret yields no call.
   */
  async interpretErc(report: ErcReport, structural: ValidationIssue[]): Promise<string[]> {
    if (!this.llm) return [];

    const ercHasFindings = report.available && (report.violationCount > 0 || report.exitCode !== 0);
    if (!ercHasFindings && structural.length === 0) return [];

    const result = await this.llm.callLLMWithValidation(
      ercInterpretationPrompt(summarizeErc(report, 25), structural.map(formatIssue)),
      validateSuggestionsResponse,
      { temperature: 0.1, maxTokens: 1200 }
    );

    if (!result.success || !result.data) {
      validatorAgentLogger.warn('ERC interpretation reply was not usable', {
        attempts: result.attempts,
        error: result.error,
      });
      return [];
    }

    validatorAgentLogger.info('ERC interpreted', { suggestionCount: result.data.length });
    return result.data;
  }
}
