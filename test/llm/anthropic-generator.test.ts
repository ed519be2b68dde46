/**
 * Tests for AnthropicGenerator with the SDK client mocked.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create };
  },
}));

import { AnthropicGenerator } from '../../src/llm/anthropic-generator.js';

describe('AnthropicGenerator', () => {
  const savedKey = process.env.ANTHROPIC_API_KEY;

  beforeEach(() => {
    create.mockReset();
    delete process.env.ANTHROPIC_API_KEY;
  });

  afterEach(() => {
    if (savedKey === undefined) {
      delete process.env.ANTHROPIC_API_KEY;
    } else {
      process.env.ANTHROPIC_API_KEY = savedKey;
    }
  });

  it('sends one user message and joins the text blocks', async () => {
    create.mockResolvedValue({
      content: [
        { type: 'text', text: 'project kickoff' },
        { type: 'tool_use', id: 't1', name: 'noop', input: {} },
        { type: 'text', text: '\nkickoff meeting' },
      ],
    });
    const generator = new AnthropicGenerator({ apiKey: 'test-secret' });

    const text = await generator.generate('Expand this', {
      model: 'claude-3-haiku-20240307',
      timeoutMs: 5000,
      temperature: 0.7,
      maxTokens: 50,
    });

    expect(text).toBe('project kickoff\nkickoff meeting');
    expect(create).toHaveBeenCalledWith(
      {
        model: 'claude-3-haiku-20240307',
        max_tokens: 50,
        temperature: 0.7,
        messages: [{ role: 'user', content: 'Expand this' }],
      },
      expect.objectContaining({ timeout: 5000 }),
    );
  });

  it('defaults max_tokens and omits temperature', async () => {
    create.mockResolvedValue({ content: [] });

    await new AnthropicGenerator({ apiKey: 'test-secret' }).generate('p', { model: 'm', timeoutMs: 1000 });

    expect(create.mock.calls[0][0]).toEqual({
      model: 'm',
      max_tokens: 256,
      messages: [{ role: 'user', content: 'p' }],
    });
  });

  it('reads the key from ANTHROPIC_API_KEY', async () => {
    process.env.ANTHROPIC_API_KEY = 'test-secret';
    create.mockResolvedValue({ content: [{ type: 'text', text: 'NO' }] });

    expect(await new AnthropicGenerator().generate('p', { model: 'm', timeoutMs: 1000 })).toBe('NO');
  });

  it('fails with LLM_UNAVAILABLE without a key', async () => {
    await expect(
      new AnthropicGenerator().generate('p', { model: 'm', timeoutMs: 1000 }),
    ).rejects.toMatchObject({ code: 'LLM_UNAVAILABLE' });
    expect(create).not.toHaveBeenCalled();
  });

  it('maps an API failure to LLM_UNAVAILABLE', async () => {
    create.mockRejectedValue(new Error('overloaded'));

    await expect(
      new AnthropicGenerator({ apiKey: 'test-secret' }).generate('p', { model: 'm', timeoutMs: 1000 }),
    ).rejects.toMatchObject({ code: 'LLM_UNAVAILABLE', message: 'Anthropic request failed' });
  });

  it('maps its own deadline to LLM_TIMEOUT', async () => {
    create.mockImplementation(
      (_body: unknown, opts: { signal: AbortSignal }) =>
        new Promise((_, reject) => {
          opts.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        }),
    );

    await expect(
      new AnthropicGenerator({ apiKey: 'test-secret' }).generate('p', { model: 'm', timeoutMs: 20 }),
    ).rejects.toMatchObject({ code: 'LLM_TIMEOUT' });
  });
});
