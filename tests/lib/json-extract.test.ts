/**
 * JSON extraction from model output: direct parse, fences, brace search.
 */

import { describe, it, expect } from 'vitest';
import { extractJson, findBalancedSpan } from '@/lib/json-extract.js';
import type { JsonExtractResult } from '@/lib/json-extract.js';

function extracted(result: JsonExtractResult): { data: unknown; method: string } {
  if (!result.success) throw new Error(`expected success, got: ${result.error}`);
  return { data: result.data, method: result.method };
}

describe('extractJson', () => {
  describe('direct parse', () => {
    it('should parse clean JSON directly', () => {
      expect(extracted(extractJson('{"key": "value"}'))).toEqual({ data: { key: 'value' }, method: 'direct' });
    });

    it('should parse JSON with leading/trailing whitespace', () => {
      expect(extracted(extractJson('  \n{"key": "value"}\n  '))).toEqual({ data: { key: 'value' }, method: 'direct' });
    });

    it('should parse JSON arrays', () => {
      expect(extracted(extractJson('[1, 2, 3]'))).toEqual({ data: [1, 2, 3], method: 'direct' });
    });
  });

  describe('fence extraction', () => {
    it('should extract JSON from a json fence', () => {
      const input = `Here is the plan:

\`\`\`json
{"tasks": [{"id": "readme"}]}
\`\`\`

Let me know if you need anything else.`;

      expect(extracted(extractJson(input))).toEqual({ data: { tasks: [{ id: 'readme' }] }, method: 'fence' });
    });

    it('should extract JSON from a fence without language', () => {
      const input = 'Response:\n\n```\n{"key": "value"}\n```';

      expect(extracted(extractJson(input))).toEqual({ data: { key: 'value' }, method: 'fence' });
    });

    it('should take the first fence that parses', () => {
      const input = '```\nnot json\n```\n\n```json\n{"valid": true}\n```';

      expect(extracted(extractJson(input))).toEqual({ data: { valid: true }, method: 'fence' });
    });
  });

  describe('brace search', () => {
    it('should find a JSON object inside prose', () => {
      const input = 'Sure! Here is the JSON: {"decision": "allow"} Hope that helps!';

      expect(extracted(extractJson(input))).toEqual({ data: { decision: 'allow' }, method: 'search' });
    });

    it('should handle strings with braces inside', () => {
      const input = 'JSON: {"code": "function() { return {}; }"}';

      expect(extracted(extractJson(input)).data).toEqual({ code: 'function() { return {}; }' });
    });

    it('should handle escaped quotes in strings', () => {
      const input = 'Data: {"message": "He said \\"hello\\""}';

      expect(extracted(extractJson(input)).data).toEqual({ message: 'He said "hello"' });
    });
  });

  describe('failure cases', () => {
    it('should fail on text with no JSON', () => {
      const result = extractJson('This is just plain text with no JSON at all.');

      expect(result).toEqual({ success: false, error: 'No JSON object or array found in model output' });
    });

    it('should fail on an unbalanced object', () => {
      const result = extractJson('Result: {"key": "value"');

      expect(result).toEqual({ success: false, error: 'No JSON object or array found in model output' });
    });

    it('should report a parse failure for a balanced but invalid span', () => {
      const result = extractJson('Result: {key: value}');

      expect(result.success).toBe(false);
      expect(!result.success && result.error).toMatch(/^Found JSON-like span but parse failed/);
    });
  });
});

describe('findBalancedSpan', () => {
  it('should start at whichever bracket comes first', () => {
    expect(findBalancedSpan('x [1, {"a": 2}] y')).toBe('[1, {"a": 2}]');
    expect(findBalancedSpan('x {"a": [1]} y')).toBe('{"a": [1]}');
  });

  it('should return null when nothing opens', () => {
    expect(findBalancedSpan('plain')).toBeNull();
  });
});
