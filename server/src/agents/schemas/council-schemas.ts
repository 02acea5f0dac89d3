/**
 * Zod schemas for council model output.
 *
 * Evaluation schemas are strict on the numbers the router depends on: a score
 * or confidence outside [0, 1] is a schema violation and the call is retried.
 * List fields are permissive and default to empty.
 */

import { z } from 'zod';

const unitInterval = z.number().min(0).max(1);

const recommendation = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase().replace(/[\s-]+/g, '_') : value),
  z.enum(['approve', 'reject', 'needs_review']),
);

const stringList = z.array(z.string()).optional().default([]);

// ─── Agent evaluation ────────────────────────────────────────────────
// LLM returns: { score, recommendation, confidence, rationale, strengths, concerns, questions }

export const EvaluationOutputSchema = z.object({
  score: unitInterval,
  recommendation,
  confidence: unitInterval,
  rationale: z.string().min(1),
  strengths: stringList,
  concerns: stringList,
  questions: stringList,
});

export type EvaluationOutput = z.infer<typeof EvaluationOutputSchema>;

// ─── Deliberation revision ───────────────────────────────────────────

// Lists and rationale may be omitted; the prior evaluation's are kept then.

export const RevisionOutputSchema = z.object({
  score: unitInterval,
  recommendation,
  confidence: unitInterval,
  revision_rationale: z.string().optional().default(''),
  rationale: z.string().optional(),
  strengths: z.array(z.string()).optional(),
  concerns: z.array(z.string()).optional(),
  questions: z.array(z.string()).optional(),
});

export type RevisionOutput = z.infer<typeof RevisionOutputSchema>;

// ─── Synthesis ───────────────────────────────────────────────────────

export const SynthesisOutputSchema = z.object({
  synthesis: z.string().min(1),
  applicant_feedback: z.string().min(1),
});

export type SynthesisOutput = z.infer<typeof SynthesisOutputSchema>;

// ─── Learning reflections ────────────────────────────────────────────
// LLM returns: { observations: [{ pattern, tags, confidence }] }

export const LearnedObservationSchema = z.object({
  pattern: z.string().min(1),
  tags: z.array(z.string()).optional().default([]),
  confidence: unitInterval.optional().default(0.5),
});

export const LearningOutputSchema = z.object({
  observations: z.array(LearnedObservationSchema).optional().default([]),
});

export type LearnedObservation = z.infer<typeof LearnedObservationSchema>;
export type LearningOutput = z.infer<typeof LearningOutputSchema>;
