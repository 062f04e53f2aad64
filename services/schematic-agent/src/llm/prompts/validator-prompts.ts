/**
 * Schematic Agent - Validator Prompts
 *
 * Compliance review of written schematic text and interpretation of ERC
 * findings into repair suggestions.
 */

import { z } from 'zod';
import { LLMMessage } from '../types.js';
import { extractJsonObject } from './json-reply.js';

export const REVIEW_TEXT_LIMIT = 10000;

/**
 * Generate a prompt for KiCad 9 format and layout review
 */
export function complianceReviewPrompt(schematicText: string): LLMMessage[] {
  const systemPrompt = `You are a KiCad 9 schematic format validator. Check the text for KiCad 9 S-expression compliance and layout sanity.
Verify: top-level (kicad_sch ...), (paper ...), (title_block ...), symbol blocks with (lib_id ...), (at ...), (uuid ...), (property ...).
Also verify engineering layout basics: placed symbol instances not overlapping based on their (at x y) position and typical symbol sizes; reasonable spacing; consistent orientation.
Return ONLY JSON: {"issues": string[]} with specific, actionable messages. Return an empty array when the schematic is acceptable.`;

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: schematicText.slice(0, REVIEW_TEXT_LIMIT) },
  ];
}

/**
 * Generate a prompt turning ERC and structural findings into fixes
 */
export function ercInterpretationPrompt(ercSummary: string[], structural: string[]): LLMMessage[] {
  const systemPrompt = `You are a KiCad electrical rules expert. Given ERC output and structural check results for a generated schematic, propose concrete repairs an automated layout agent can apply: symbol choice, positions, rotations, net assignments or missing no-connect flags.
Return ONLY JSON: {"suggestions": string[]}. Each suggestion names the affected reference or net.`;

  const userPrompt = JSON.stringify({
    erc: ercSummary,
    structural,
  });

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: userPrompt },
  ];
}

const IssuesSchema = z.object({ issues: z.array(z.unknown()) });
const SuggestionsSchema = z.object({ suggestions: z.array(z.unknown()) });

/**
 * Validator for compliance review replies
 */
export function validateIssuesResponse(response: string): string[] | null {
  const parsed = IssuesSchema.safeParse(extractJsonObject(response));
  return parsed.success ? parsed.data.issues.map(String) : null;
}

/**
 * Validator for ERC interpretation replies
 */
export function validateSuggestionsResponse(response: string): string[] | null {
  const parsed = SuggestionsSchema.safeParse(extractJsonObject(response));
  return parsed.success ? parsed.data.suggestions.map(String) : null;
}
