import type { FileCategory } from './types.js';

/**
 * Detects the file category from its name (case-insensitive):
 * "bpafg" → demand, "priority" → priority template, anything else → OpEx.
 */
export const detectFileCategory = (filename: string): FileCategory => {
  const name = filename.toLowerCase();
  if (name.includes('bpafg')) {
    return 'demand';
  }
  if (name.includes('priority')) {
    return 'priority';
  }
  return 'opex';
};

/**
 * OpEx unit by sheet name: man-months when the name mentions "mm" and no "$".
 */
export const deriveDataType = (sheetName: string): 'dollar' | 'mm' => {
  const name = sheetName.toLowerCase();
  return name.includes('mm') && !name.includes('$') ? 'mm' : 'dollar';
};
