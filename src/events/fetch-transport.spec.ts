import FetchTransport, { TransportError } from './fetch-transport';

describe('FetchTransport', () => {
  global.fetch = jest.fn();
  const destination = 'https://collector.example.com/v1/events';
  const payload = JSON.stringify({ schema: 'test/event', session_id: 'test-session' });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should POST the payload as the request body', async () => {
    (global.fetch as jest.Mock).mockResolvedValue({ ok: true, status: 204 });
    const transport = new FetchTransport({ headers: { 'x-client': 'test-client' } });

    const result = await transport.send(destination, payload);

    expect(result).toEqual({ success: true });
    expect(global.fetch).toHaveBeenCalledWith(destination, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'x-client': 'test-client' },
      body: payload,
      signal: expect.any(AbortSignal),
    });
  });

  it('should use the configured content type', async () => {
    (global.fetch as jest.Mock).mockResolvedValue({ ok: true, status: 200 });
    const transport = new FetchTransport({ contentType: 'text/plain' });

    await transport.send(destination, 'plain body');

    const fetchOptions = (global.fetch as jest.Mock).mock.calls[0][1];
    expect(fetchOptions.headers).toEqual({ 'Content-Type': 'text/plain' });
  });

  it('should return a failed result if response is not OK', async () => {
    (global.fetch as jest.Mock).mockResolvedValue({ ok: false, status: 503 });
    const transport = new FetchTransport();

    const result = await transport.send(destination, payload);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message).toBe('Collector responded with status 503');
      expect(result.error).toHaveProperty('status', 503);
    }
  });

  it('should cancel the body of a successful response', async () => {
    const cancel = jest.fn().mockResolvedValue(undefined);
    (global.fetch as jest.Mock).mockResolvedValue({ ok: true, status: 200, body: { cancel } });
    const transport = new FetchTransport();

    const result = await transport.send(destination, payload);

    expect(result).toEqual({ success: true });
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('should cancel the body of a failed response', async () => {
    const cancel = jest.fn().mockResolvedValue(undefined);
    (global.fetch as jest.Mock).mockResolvedValue({ ok: false, status: 503, body: { cancel } });
    const transport = new FetchTransport();

    const result = await transport.send(destination, payload);

    expect(result.success).toBe(false);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('should still report success when cancelling the body fails', async () => {
    const cancel = jest.fn().mockRejectedValue(new Error('stream locked'));
    (global.fetch as jest.Mock).mockResolvedValue({ ok: true, status: 204, body: { cancel } });
    const transport = new FetchTransport();

    const result = await transport.send(destination, payload);

    expect(result).toEqual({ success: true });
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('should handle fetch errors without throwing', async () => {
    const networkError = new Error('Network error');
    (global.fetch as jest.Mock).mockRejectedValue(networkError);
    const transport = new FetchTransport();

    const result = await transport.send(destination, payload);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Request failed');
      expect(result.error).toHaveProperty('status', 0);
      expect(result.error).toHaveProperty('cause', networkError);
    }
  });

  it('should report a timeout when the request is aborted', async () => {
    jest.useFakeTimers();
    (global.fetch as jest.Mock).mockImplementation(
      (_url: string, init: { signal: AbortSignal }) =>
        new Promise((_resolve, reject) => {
          init.signal.addEventListener('abort', () => {
            const abortError = new Error('This operation was aborted');
            abortError.name = 'AbortError';
            reject(abortError);
          });
        }),
    );
    const transport = new FetchTransport({ timeoutMs: 50 });

    const pending = transport.send(destination, payload);
    jest.advanceTimersByTime(50);
    const result = await pending;
    jest.useRealTimers();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Request timed out after 50ms');
      expect(result.error).toHaveProperty('status', 408);
    }
  });
});
