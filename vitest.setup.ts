process.env.NODE_ENV = process.env.NODE_ENV ?? "test";
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "silent";
process.env.BLAND_API_KEY = process.env.BLAND_API_KEY ?? "test-secret";

// Tests never reach the provider; FetchTransport runs against a local fastify server.
