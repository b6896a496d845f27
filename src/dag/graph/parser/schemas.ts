/**
 * @file Pipeline Document Schemas
 *
 * Zod runtime schemas for YAML pipeline documents. Each target declares
 * either a `command` (code or file target) or a `document` (literate
 * target); everything else is optional.
 *
 * @module dag/graph/parser/schemas
 */

import { z } from 'zod';

/**
 * Target and capability names must be expression identifiers, since
 * commands refer to targets by bare name.
 */
export const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const IdentifierSchema = z
    .string()
    .regex(IDENTIFIER_PATTERN, 'must be an identifier (letters, digits, underscore)');

export const TargetSchema = z
    .object({
        name:     IdentifierSchema,
        command:  z.string().min(1, 'command must not be empty').optional(),
        document: z.string().min(1, 'document must not be empty').optional(),
        output:   z.string().min(1).optional(),
        format:   z.enum(['value', 'file']).optional(),
        packages: z.array(IdentifierSchema).default([]),
        cue:      z.enum(['thorough', 'always', 'never']).default('thorough'),
    })
    .strict()
    .refine(t => (t.command === undefined) !== (t.document === undefined), {
        message: 'a target declares exactly one of command or document',
    })
    .refine(t => t.document === undefined || t.format === undefined || t.format === 'file', {
        message: 'a document target is always format: file',
    })
    .refine(t => t.output === undefined || t.document !== undefined, {
        message: 'output applies to document targets only',
    });

export const PipelineSchema = z.object({
    name:     z.string().default('pipeline'),
    packages: z.array(IdentifierSchema).default([]),
    targets:  z.array(TargetSchema),
});

export type RawPipeline = z.infer<typeof PipelineSchema>;
export type RawTarget  = z.infer<typeof TargetSchema>;
