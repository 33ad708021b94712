// Jest setup file for test configuration
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.EMAIL_CLIENT_TYPE = 'log';
process.env.OUT_OF_STOCK_RECIPIENT = 'stock-test@example.com';

// Set test timeout
jest.setTimeout(10000);
