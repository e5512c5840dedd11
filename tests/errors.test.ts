import { describe, it, expect } from 'vitest';
import { CollectorError, InferenceError, PipelineError, errorMessage, extractK8sErrorMessage } from '../src/errors';

describe('errors', () => {
  describe('extractK8sErrorMessage', () => {
    it('should read the message from a JSON body', () => {
      const error = { body: JSON.stringify({ message: 'container "main" in pod "my-pod" is not available' }) };

      expect(extractK8sErrorMessage(error, 'my-pod')).toBe('container "main" in pod "my-pod" is not available');
    });

    it('should use a non-JSON body as-is', () => {
      expect(extractK8sErrorMessage({ body: 'plain text error from API' }, 'my-pod')).toBe('plain text error from API');
    });

    it('should read response.body.message', () => {
      const error = { response: { body: { message: 'pod "gone-pod" not found' } } };

      expect(extractK8sErrorMessage(error, 'gone-pod')).toBe('pod "gone-pod" not found');
    });

    it('should fall back to error.message', () => {
      expect(extractK8sErrorMessage(new Error('connect ECONNREFUSED'), 'my-pod')).toBe('connect ECONNREFUSED');
    });

    it('should skip a JSON body without message', () => {
      const error = { body: '{"kind":"Status"}', message: 'HTTP-Code: 500' };

      expect(extractK8sErrorMessage(error, 'my-pod')).toBe('HTTP-Code: 500');
    });

    it('should name the object when nothing else is available', () => {
      expect(extractK8sErrorMessage({}, 'my-pod')).toBe('Unknown error for my-pod');
      expect(extractK8sErrorMessage(undefined, 'my-pod')).toBe('Unknown error for my-pod');
    });
  });

  describe('error classes', () => {
    it('should carry stage and cause', () => {
      const cause = new Error('socket hang up');
      const error = new CollectorError('logs', 'Failed to get logs', cause);

      expect(error).toBeInstanceOf(PipelineError);
      expect(error.name).toBe('CollectorError');
      expect(error.stage).toBe('logs');
      expect(error.cause).toBe(cause);
    });

    it('should tag inference errors with the inference stage', () => {
      expect(new InferenceError('bad body').stage).toBe('inference');
    });
  });

  describe('errorMessage', () => {
    it('should stringify non-Error values', () => {
      expect(errorMessage('oops')).toBe('oops');
      expect(errorMessage(new Error('boom'))).toBe('boom');
    });
  });
});
