/**
 * @file Shared Parsing Utilities
 *
 * Helpers shared by the pipeline document parser and the settings
 * loader.
 *
 * @module dag/graph/parser
 */

import yaml from 'js-yaml';
import type { ZodError } from 'zod';

/** Parse a YAML string into a JS object. */
export function yaml_parse(yamlStr: string): unknown {
    return yaml.load(yamlStr);
}

/** Flatten zod issues into one `[path] message; ...` line. */
export function issues_format(error: ZodError): string {
    return error.issues
        .map(i => `[${i.path.join('.')}] ${i.message}`)
        .join('; ');
}
