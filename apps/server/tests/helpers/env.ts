// Loaded by Jest before every test file
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret-value';
delete process.env.REDIS_URL;
