import { vi } from 'vitest';
import type { ILogger } from '@quire/types';

/**
 * Recording logger for service tests.
 *
 * Child loggers share the parent's spies, so a test can assert on
 * `logger.warn` no matter which scoped child the service logged through.
 *
 * @example
 * ```typescript
 * const logger = new MockLogger();
 * const policy = new ContentErrorPolicy(true, logger);
 * policy.handle(new ContentError('about.md', 'Bad front matter'));
 * expect(logger.warn).toHaveBeenCalledTimes(1);
 * ```
 */
export class MockLogger implements ILogger {
    public fatal = vi.fn();
    public error = vi.fn();
    public warn = vi.fn();
    public info = vi.fn();
    public debug = vi.fn();
    public trace = vi.fn();
    public child = vi.fn((): ILogger => this);
}
