export const config = {
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  jwt: {
    secret: process.env.JWT_SECRET || 'dev-jwt-secret',
  },
  database: {
    url: process.env.DATABASE_URL || 'postgres://localhost:5432/tiffin_wallet',
    poolMax: parseInt(process.env.DATABASE_POOL_MAX || '10', 10),
    connectionTimeoutMs: parseInt(process.env.DATABASE_CONNECTION_TIMEOUT_MS || '5000', 10),
    statementTimeoutMs: parseInt(process.env.DATABASE_STATEMENT_TIMEOUT_MS || '15000', 10),
  },
  ledger: {
    store: process.env.LEDGER_STORE === 'memory' ? 'memory' : 'postgres',
  },
  wallet: {
    lockTimeoutMs: parseInt(process.env.WALLET_LOCK_TIMEOUT_MS || '5000', 10),
    deliveryFee: process.env.DELIVERY_FEE || '10.00',
  },
} as const;
