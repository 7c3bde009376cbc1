/**
 * Loads the label catalog from its YAML file.
 */

import { readFile } from 'node:fs/promises';

import { err, type Result } from 'neverthrow';
import { parse } from 'yaml';

import { buildLabelCatalog } from '../core/catalog.js';
import { createConfigError, type ConfigError } from '../core/errors.js';

import type { LabelCatalog } from '../core/types.js';

/**
 * Parses YAML text into a validated, frozen catalog.
 */
export const parseLabelCatalog = (
  text: string,
  source = 'labels.yaml'
): Result<LabelCatalog, ConfigError> => {
  let document: unknown;
  try {
    document = parse(text);
  } catch (error) {
    return err(createConfigError(source, 'Label catalog is not valid YAML', error));
  }
  return buildLabelCatalog(document, source);
};

/**
 * Reads and parses the catalog at `path`.
 */
export const loadLabelCatalog = async (path: string): Promise<Result<LabelCatalog, ConfigError>> => {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    return err(createConfigError(path, `Cannot read label catalog at ${path}`, error));
  }
  return parseLabelCatalog(text, path);
};
