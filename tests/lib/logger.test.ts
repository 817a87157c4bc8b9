import { createLogger } from '../../src/lib/logger';

describe('createLogger', () => {
  it('should use the configured level outside tests', () => {
    expect(createLogger({ WORKER_LOG_LEVEL: 'warn', NODE_ENV: 'production' }).level).toBe('warn');
  });

  it('should stay silent under test', () => {
    expect(createLogger({ WORKER_LOG_LEVEL: 'debug', NODE_ENV: 'test' }).level).toBe('silent');
  });

  it('should tag records with the service name', () => {
    expect(createLogger({ WORKER_LOG_LEVEL: 'info', NODE_ENV: 'production' }).bindings()).toEqual({
      service: 'car-watch-worker',
      env: 'production',
    });
  });
});
