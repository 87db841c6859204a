export const SCHEMA_VERSION = 1;

export const CREATE_BASE_TABLES = `
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  applied_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS kv (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS transactions (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  timestamp INTEGER NOT NULL,
  caller TEXT NOT NULL,
  method TEXT NOT NULL,
  params TEXT NOT NULL,
  events TEXT NOT NULL,
  committed_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS events (
  id TEXT PRIMARY KEY,
  tx_seq INTEGER NOT NULL REFERENCES transactions(seq),
  log_index INTEGER NOT NULL,
  registry TEXT NOT NULL,
  type TEXT NOT NULL,
  agent_id INTEGER,
  timestamp INTEGER NOT NULL,
  payload TEXT NOT NULL,
  UNIQUE (tx_seq, log_index)
);

CREATE TABLE IF NOT EXISTS audit_entries (
  id TEXT PRIMARY KEY,
  timestamp TEXT NOT NULL,
  category TEXT NOT NULL,
  action TEXT NOT NULL,
  details TEXT
);

CREATE TABLE IF NOT EXISTS request_replay (
  request_fingerprint TEXT PRIMARY KEY,
  created_at TEXT NOT NULL,
  expires_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_transactions_caller ON transactions(caller);
CREATE INDEX IF NOT EXISTS idx_events_agent ON events(registry, agent_id);
CREATE INDEX IF NOT EXISTS idx_events_type ON events(type);
CREATE INDEX IF NOT EXISTS idx_audit_timestamp ON audit_entries(timestamp);
CREATE INDEX IF NOT EXISTS idx_request_replay_expires ON request_replay(expires_at);
`;
