/**
 * Dedup store schema
 * One row per published vacancy identity; rows past the retention window are deleted
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS posted_jobs (
  identity VARCHAR(64) PRIMARY KEY,
  first_seen_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
  title VARCHAR(500),
  company VARCHAR(255),
  level VARCHAR(16),
  source_name VARCHAR(50)
);

CREATE INDEX IF NOT EXISTS idx_posted_jobs_first_seen_at ON posted_jobs(first_seen_at);
`;
