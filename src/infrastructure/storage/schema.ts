export const SCHEMA = `
CREATE TABLE IF NOT EXISTS balance_history (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL,
  spot_balance REAL NOT NULL,
  futures_balance REAL NOT NULL,
  total_balance REAL NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_balance_history_timestamp
  ON balance_history(timestamp);
`
