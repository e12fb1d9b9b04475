// Runs before every test file, ahead of the env module
process.env.NODE_ENV = 'test'
process.env.JWT_SECRET = 'test-secret'
process.env.DEFAULT_DATE_RANGE_DAYS = '30'
