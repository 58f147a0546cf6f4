const log = (...args: unknown[]) => console.log('[LOG]', ...args);
const info = (...args: unknown[]) => console.info('[INFO]', ...args);
const error = (...args: unknown[]) => console.error('[ERROR]', ...args);
const warn = (...args: unknown[]) => console.warn('[WARN]', ...args);

// Deprecated code paths keep working; callers only get told.
const deprecation = (message: string) => console.warn('[DEPRECATION]', message);

export default { log, info, error, warn, deprecation };
