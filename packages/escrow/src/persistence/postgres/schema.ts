/**
 * Escrow tables. Every statement is idempotent; ensureSchema() runs it on
 * each start.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS escrow_bounties (
  id             INTEGER PRIMARY KEY,
  creator        TEXT NOT NULL,
  amount         NUMERIC(78, 0) NOT NULL CHECK (amount > 0),
  title          TEXT NOT NULL,
  description    TEXT NOT NULL,
  requirements   TEXT NOT NULL,
  deadline       BIGINT NOT NULL,
  status         TEXT NOT NULL CHECK (status IN ('OPEN', 'SUBMITTED', 'COMPLETED', 'CANCELLED')),
  winner         TEXT,
  submission_url TEXT,
  created_at     BIGINT NOT NULL,
  pending_kind         TEXT CHECK (pending_kind IN ('payout', 'refund')),
  pending_recipient    TEXT,
  pending_reference    TEXT,
  pending_requested_by TEXT
);

ALTER TABLE escrow_bounties ADD COLUMN IF NOT EXISTS pending_kind TEXT;
ALTER TABLE escrow_bounties ADD COLUMN IF NOT EXISTS pending_recipient TEXT;
ALTER TABLE escrow_bounties ADD COLUMN IF NOT EXISTS pending_reference TEXT;
ALTER TABLE escrow_bounties ADD COLUMN IF NOT EXISTS pending_requested_by TEXT;

CREATE INDEX IF NOT EXISTS escrow_bounties_status_idx ON escrow_bounties (status);

CREATE TABLE IF NOT EXISTS escrow_submissions (
  bounty_id      INTEGER NOT NULL REFERENCES escrow_bounties (id),
  submitter      TEXT NOT NULL,
  submission_url TEXT NOT NULL,
  description    TEXT NOT NULL,
  submitted_at   BIGINT NOT NULL,
  verified       BOOLEAN NOT NULL DEFAULT FALSE,
  PRIMARY KEY (bounty_id, submitter)
);

CREATE TABLE IF NOT EXISTS escrow_verifiers (
  identity   TEXT PRIMARY KEY,
  approved   BOOLEAN NOT NULL,
  updated_by TEXT NOT NULL,
  updated_at BIGINT NOT NULL
);

CREATE TABLE IF NOT EXISTS escrow_counters (
  name  TEXT PRIMARY KEY,
  value INTEGER NOT NULL
);

INSERT INTO escrow_counters (name, value) VALUES ('next_bounty_id', 1)
ON CONFLICT (name) DO NOTHING;
`;
