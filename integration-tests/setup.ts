// Keep test output readable; the logger reads LOG_LEVEL on every call.
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
