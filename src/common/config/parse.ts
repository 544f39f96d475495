// src/common/config/parse.ts
import YAML from 'yaml';

/**
 * Parse configuration text based on file extension.
 * - JSON when path ends with ".json"
 * - YAML otherwise (".yml", ".yaml")
 * An empty document parses to an empty object.
 */
export const parseText = (p: string, text: string): unknown => {
  if (!text.trim()) return {};
  return p.endsWith('.json')
    ? (JSON.parse(text) as unknown)
    : (YAML.parse(text) as unknown);
};
