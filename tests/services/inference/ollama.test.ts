import { boundedSignal } from '../../../services/inference/ollama';

describe('boundedSignal', () => {
  it('should abort when the caller aborts', () => {
    const controller = new AbortController();
    const signal = boundedSignal(60_000, controller.signal);
    expect(signal.aborted).toBe(false);
    controller.abort();
    expect(signal.aborted).toBe(true);
  });

  it('should abort once the timeout elapses', async () => {
    const signal = boundedSignal(10);
    expect(signal.aborted).toBe(false);
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(signal.aborted).toBe(true);
  });
});
