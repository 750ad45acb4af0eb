import { describe, expect, it } from 'vitest';
import {
  classifyInvocation,
  countValidationErrors,
  MAX_MESSAGE_LENGTH,
  skippedResult
} from '../src/classifier.js';
import type { InvocationResult } from '../src/types.js';

function invocation(overrides: Partial<InvocationResult> = {}): InvocationResult {
  return {
    command: ['vulkan-video-dec-test'],
    exitCode: 0,
    stdout: '',
    stderr: '',
    durationSeconds: 1,
    ...overrides
  };
}

describe('classifyInvocation', () => {
  it('passes a clean run without an expected artifact', () => {
    expect(classifyInvocation(invocation(), { expectOutput: false })).toEqual({
      outcome: 'PASSED',
      message: ''
    });
  });

  it('reports harness errors as ERROR', () => {
    const result = classifyInvocation(
      invocation({ exitCode: -1, stderr: 'Timeout', harnessError: { kind: 'timeout', message: 'Timeout after 300s' } }),
      { expectOutput: false }
    );
    expect(result).toEqual({ outcome: 'ERROR', message: 'Timeout after 300s' });
  });

  it('fails a non-zero exit with the stderr text', () => {
    const result = classifyInvocation(invocation({ exitCode: 3, stderr: '  device lost \n' }), {
      expectOutput: false
    });
    expect(result).toEqual({ outcome: 'FAILED', message: 'device lost' });
  });

  it('falls back to stdout and then a placeholder message', () => {
    expect(classifyInvocation(invocation({ exitCode: 1, stdout: 'bad stream' }), { expectOutput: false }).message).toBe(
      'bad stream'
    );
    expect(classifyInvocation(invocation({ exitCode: 1 }), { expectOutput: false }).message).toBe('Unknown error');
  });

  it('truncates long diagnostics', () => {
    const result = classifyInvocation(invocation({ exitCode: 1, stderr: 'x'.repeat(500) }), {
      expectOutput: false
    });
    expect(result.message).toHaveLength(MAX_MESSAGE_LENGTH);
  });

  it('fails a zero exit whose log reports a validation error', () => {
    const result = classifyInvocation(
      invocation({ stderr: 'Validation Error: [ VUID-vkCmdDecodeVideoKHR-00001 ]' }),
      { expectOutput: false }
    );
    expect(result).toEqual({
      outcome: 'FAILED',
      message: 'Validation Error: [ VUID-vkCmdDecodeVideoKHR-00001 ]'
    });
  });

  it('fails a zero exit with Vulkan diagnostics when validation is on', () => {
    const run = invocation({ stderr: 'VK_ERROR_DEVICE_LOST\nERROR: vkQueueSubmit failed' });
    expect(classifyInvocation(run, { expectOutput: false, validate: true })).toEqual({
      outcome: 'FAILED',
      message: 'VK_ERROR_DEVICE_LOST\nERROR: vkQueueSubmit failed'
    });
    expect(classifyInvocation(run, { expectOutput: false }).outcome).toBe('PASSED');
  });

  it('fails a zero exit whose expected artifact is empty', () => {
    expect(classifyInvocation(invocation(), { expectOutput: true, outputSize: 0 })).toEqual({
      outcome: 'FAILED',
      message: 'Output file is empty'
    });
  });

  it('fails a zero exit whose expected artifact is missing', () => {
    expect(classifyInvocation(invocation(), { expectOutput: true })).toEqual({
      outcome: 'FAILED',
      message: 'Output file not created'
    });
  });

  it('passes when the expected artifact has content', () => {
    expect(classifyInvocation(invocation(), { expectOutput: true, outputSize: 2048 }).outcome).toBe('PASSED');
  });

  describe('decoder log scan', () => {
    it('passes a validation-layer status line that mentions errors', () => {
      const result = classifyInvocation(
        invocation({ stdout: 'Decoder: using validation layer, no errors detected' }),
        { expectOutput: false, logScan: 'decoder' }
      );
      expect(result.outcome).toBe('PASSED');
    });

    it('fails a log that mentions an error without validation', () => {
      const result = classifyInvocation(invocation({ stderr: 'Error parsing sequence header' }), {
        expectOutput: false,
        logScan: 'decoder'
      });
      expect(result).toEqual({ outcome: 'FAILED', message: 'Error parsing sequence header' });
    });

    it('leaves encoder logs with benign error tokens alone', () => {
      const result = classifyInvocation(invocation({ stdout: 'error resilience: off' }), {
        expectOutput: false
      });
      expect(result.outcome).toBe('PASSED');
    });
  });
});

describe('countValidationErrors', () => {
  it('counts lines carrying a diagnostic', () => {
    const log = ['VALIDATION ERROR in queue submit', 'frame 1 ok', 'VK_ERROR_DEVICE_LOST', 'ERROR: bad fence'].join('\n');
    expect(countValidationErrors(log)).toBe(3);
    expect(countValidationErrors('all good')).toBe(0);
  });
});

describe('skippedResult', () => {
  it('builds a zero-duration result with the reason', () => {
    expect(
      skippedResult({ name: 'DEC_AV1_clip', codec: 'av1', category: 'decode', description: 'clip' }, 'Input file not found: /v/clip.ivf')
    ).toEqual({
      name: 'DEC_AV1_clip',
      codec: 'av1',
      category: 'decode',
      description: 'clip',
      outcome: 'SKIPPED',
      durationSeconds: 0,
      message: 'Input file not found: /v/clip.ivf',
      validationErrors: 0,
      command: ''
    });
  });
});
