import { describe, it, expect, vi } from 'vitest';
import { AnalysisRequester, buildAnalysisPrompt, formatEventLines } from '../../src/analysis/analysisRequester';
import type { TextGenerator } from '../../src/analysis/textGenerator';
import { InferenceError } from '../../src/errors';
import { makeEvent } from '../helpers/fakes';

describe('analysisRequester', () => {
  describe('formatEventLines', () => {
    it('should render one dash-prefixed line per event', () => {
      const lines = formatEventLines([
        makeEvent({ reason: 'OOMKilled', message: 'Container exceeded memory limit' }),
        makeEvent({ reason: 'BackOff', message: 'Back-off restarting failed container' })
      ]);

      expect(lines).toBe('- OOMKilled: Container exceeded memory limit\n- BackOff: Back-off restarting failed container');
    });

    it('should render nothing for no events', () => {
      expect(formatEventLines([])).toBe('');
    });
  });

  describe('buildAnalysisPrompt', () => {
    it('should combine preamble, events and logs', () => {
      const prompt = buildAnalysisPrompt({
        rawLogs: 'error: connection refused',
        events: [makeEvent({ reason: 'Failed', message: 'OOMKilled' })]
      });

      expect(prompt).toBe(
        'Here are the logs and events from a Kubernetes pod. Help me identify the issue and suggest a fix.\n\n' +
          'Events:\n- Failed: OOMKilled\n\n' +
          'Logs:\nerror: connection refused'
      );
    });
  });

  describe('AnalysisRequester', () => {
    it('should return the generated text', async () => {
      const generator: TextGenerator = { generate: vi.fn().mockResolvedValue('Root cause: missing DATABASE_URL') };
      const requester = new AnalysisRequester(generator);

      const analysis = await requester.analyze({ rawLogs: 'boom', events: [] });

      expect(analysis).toBe('Root cause: missing DATABASE_URL');
      expect(generator.generate).toHaveBeenCalledWith(expect.stringContaining('Logs:\nboom'), undefined);
    });

    it('should forward the cancellation signal', async () => {
      const generate = vi.fn().mockResolvedValue('ok');
      const controller = new AbortController();

      await new AnalysisRequester({ generate }).analyze({ rawLogs: '', events: [] }, controller.signal);

      expect(generate.mock.calls[0]?.[1]).toBe(controller.signal);
    });

    it('should wrap transport failures in InferenceError', async () => {
      const requester = new AnalysisRequester({ generate: vi.fn().mockRejectedValue(new Error('socket hang up')) });

      const failure = requester.analyze({ rawLogs: '', events: [] });

      await expect(failure).rejects.toBeInstanceOf(InferenceError);
      await expect(failure).rejects.toThrow('Inference request failed: socket hang up');
    });

    it('should pass InferenceError through unchanged', async () => {
      const original = new InferenceError('Could not decode inference response (HTTP 200)');
      const requester = new AnalysisRequester({ generate: vi.fn().mockRejectedValue(original) });

      await expect(requester.analyze({ rawLogs: '', events: [] })).rejects.toBe(original);
    });
  });
});
