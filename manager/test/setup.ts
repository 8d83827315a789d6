// Loaded before every test file (jest setupFiles), ahead of the logger import
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'error';
