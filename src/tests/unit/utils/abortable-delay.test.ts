import { abortableDelay } from '../../../utils/abortable-delay';

describe('abortableDelay', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('resolves true once the delay elapses', async () => {
    const controller = new AbortController();
    const waiting = abortableDelay(500, controller.signal);

    await jest.advanceTimersByTimeAsync(500);

    await expect(waiting).resolves.toBe(true);
  });

  it('resolves false as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const waiting = abortableDelay(500, controller.signal);

    controller.abort();

    await expect(waiting).resolves.toBe(false);
    expect(jest.getTimerCount()).toBe(0);
  });

  it('resolves false immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(abortableDelay(500, controller.signal)).resolves.toBe(false);
    expect(jest.getTimerCount()).toBe(0);
  });
});
