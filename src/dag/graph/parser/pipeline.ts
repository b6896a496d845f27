/**
 * @file Pipeline Document Parser
 *
 * Parses a YAML pipeline document into a `PipelineSpec`. The YAML is
 * validated against `PipelineSchema` (Zod) at the boundary before any
 * field access. Commands stay as text here; the registry parses them.
 *
 * @module dag/graph/parser
 */

import { SpecError } from '../../errors.js';
import type { PipelineSpec, TargetDefinition } from '../types.js';
import { issues_format, yaml_parse } from './common.js';
import { PipelineSchema, type RawTarget } from './schemas.js';

/**
 * Parse a pipeline YAML string.
 *
 * @throws SpecError (InvalidSpec) on YAML or schema violations
 */
export function pipeline_parse(yamlStr: string): PipelineSpec {
    let raw: unknown;
    try {
        raw = yaml_parse(yamlStr);
    } catch (error: unknown) {
        const reason: string = error instanceof Error ? error.message : String(error);
        throw new SpecError('InvalidSpec', `Invalid pipeline YAML: ${reason}`);
    }

    const result = PipelineSchema.safeParse(raw);
    if (!result.success) {
        throw new SpecError('InvalidSpec', `Invalid pipeline: ${issues_format(result.error)}`);
    }

    const doc = result.data;
    return {
        name:     doc.name,
        packages: doc.packages,
        targets:  doc.targets.map(definition_build),
    };
}

/** Drop absent optional fields so definitions compare cleanly. */
function definition_build(raw: RawTarget): TargetDefinition {
    const definition: TargetDefinition = {
        name:     raw.name,
        packages: raw.packages,
        cue:      raw.cue,
    };
    if (raw.command !== undefined) definition.command = raw.command;
    if (raw.document !== undefined) definition.document = raw.document;
    if (raw.output !== undefined) definition.output = raw.output;
    if (raw.format !== undefined) definition.format = raw.format;
    return definition;
}
