import { describe, it, expect } from 'vitest';
import { resolveSource, templatePlaceholders, validatePipelineConfig } from '../../src/config/schema.js';

function baseConfig(overrides: Record<string, unknown> = {}) {
  return {
    name: 'test',
    region: 'dfw',
    sources: [
      {
        name: 'listings',
        type: 'listing',
        url_templates: ['https://example.com/homes/{postal_code}'],
        postal_codes: ['75024'],
      },
    ],
    ...overrides,
  };
}

describe('pipeline config schema', () => {
  it('should apply defaults', () => {
    const result = validatePipelineConfig(baseConfig());
    expect(result.success).toBe(true);
    expect(result.data?.daily_limit).toBe(3000);
    expect(result.data?.state_dir).toBe('./state');
    expect(result.data?.defaults.retry_attempts).toBe(3);
    expect(result.data?.scoring.base).toBe(5);
    expect(result.data?.sources[0]?.enabled).toBe(true);
    expect(result.data?.sources[0]?.date_offsets_days).toEqual([0]);
  });

  it('should reject unknown source types', () => {
    const result = validatePipelineConfig(baseConfig({
      sources: [{ name: 'x', type: 'weather', urls: ['https://example.com'] }],
    }));
    expect(result.success).toBe(false);
    expect(result.errors[0]).toMatch(/^sources\.0\.type: /);
  });

  it('should reject unknown keys', () => {
    const result = validatePipelineConfig(baseConfig({ extra: true }));
    expect(result.success).toBe(false);
  });

  it('should reject duplicate source names', () => {
    const source = { name: 'dup', type: 'permit', urls: ['https://example.com/permits'] };
    const result = validatePipelineConfig(baseConfig({ sources: [source, source] }));
    expect(result.success).toBe(false);
    expect(result.errors).toContain("Duplicate source name: 'dup'");
  });

  it('should reject sources with no URLs', () => {
    const result = validatePipelineConfig(baseConfig({ sources: [{ name: 'empty', type: 'permit' }] }));
    expect(result.errors).toEqual(["Source 'empty' has neither url_templates nor urls"]);
  });

  it('should reject unknown and unfilled placeholders', () => {
    const result = validatePipelineConfig(baseConfig({
      sources: [{
        name: 'cad',
        type: 'assessor',
        url_templates: ['https://example.com/{zipcode}', 'https://example.com/{county}'],
      }],
    }));
    expect(result.errors).toEqual([
      "Source 'cad' template uses unknown placeholder '{zipcode}'",
      "Source 'cad' uses {county} but lists no counties",
    ]);
  });

  it('should reject a zero retry backoff at either level', () => {
    const atDefaults = validatePipelineConfig(baseConfig({ defaults: { retry_backoff_ms: 0 } }));
    expect(atDefaults.success).toBe(false);
    expect(atDefaults.errors[0]).toMatch(/^defaults\.retry_backoff_ms: /);

    const atSource = validatePipelineConfig(baseConfig({
      sources: [{ name: 'permits', type: 'permit', urls: ['https://example.com/p'], retry_backoff_ms: 0 }],
    }));
    expect(atSource.success).toBe(false);
    expect(atSource.errors[0]).toMatch(/^sources\.0\.retry_backoff_ms: /);
  });

  it('should list template placeholders in order', () => {
    expect(templatePlaceholders('https://x/{county}/{postal_code}?d={date}')).toEqual(['county', 'postal_code', 'date']);
  });

  it('should resolve per-source overrides over defaults', () => {
    const result = validatePipelineConfig(baseConfig({
      defaults: { max_concurrent: 20, timeout_ms: 5000 },
      sources: [{
        name: 'listings',
        type: 'listing',
        urls: ['https://example.com/a'],
        max_concurrent: 30,
      }],
    }));
    expect(result.data).toBeDefined();
    if (!result.data) return;
    const source = result.data.sources[0];
    expect(source).toBeDefined();
    if (!source) return;
    const resolved = resolveSource(result.data, source);
    expect(resolved.max_concurrent).toBe(30);
    expect(resolved.timeout_ms).toBe(5000);
    expect(resolved.requests_per_hour).toBe(1000);
    expect(resolved.incremental).toBe(true);
  });
});
