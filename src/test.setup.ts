// Skip server bootstrap during Vitest runs and keep pino quiet.
process.env.NODE_ENV = 'test';
process.env.TEST_SERVER_PORT = process.env.TEST_SERVER_PORT ?? '0';
