process.env.NODE_ENV = "test";
process.env.FACEBOOK_ACCESS_TOKEN = "test-token";
process.env.FACEBOOK_GRAPH_API_VERSION = "v8.0";
process.env.FACEBOOK_MIN_REQUEST_INTERVAL_MS = "0";
