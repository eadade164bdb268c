// Environment for every test file; nothing connects to this URI.
process.env.MONGODB_URI = process.env.MONGODB_URI || 'mongodb://localhost:27017/portfolio_ingest_test';
process.env.LOG_LEVEL = 'error';
