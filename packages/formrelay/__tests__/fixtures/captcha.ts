import { vi } from 'vitest';
import type { CaptchaSolverProvider, InteractiveJob, PollResult } from '../../src/captcha/types.js';

/** Provider whose calls are vi.fn mocks; script them per test. */
export function fakeProvider(name = 'fake') {
  return {
    name,
    submitImageJob: vi.fn<(image: Uint8Array, signal?: AbortSignal) => Promise<string>>(),
    submitInteractiveJob: vi.fn<(job: InteractiveJob, signal?: AbortSignal) => Promise<string>>(),
    pollJob: vi.fn<(jobId: string, signal?: AbortSignal) => Promise<PollResult>>(),
  } satisfies CaptchaSolverProvider;
}

export type FakeProvider = ReturnType<typeof fakeProvider>;
