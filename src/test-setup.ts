process.env.MARKET_LOG_LEVEL = process.env.MARKET_LOG_LEVEL ?? 'error';
