import type { Migration } from "../../types";

export const migration: Migration = {
  version: 1,
  name: "initial",
  description: "Artifact catalog with artifacts and deletion_log tables",
  up: `
CREATE TABLE artifacts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    artifact_id TEXT UNIQUE NOT NULL,
    source TEXT NOT NULL,
    kind TEXT NOT NULL,
    artifact_name TEXT NOT NULL,
    artifact_path TEXT NOT NULL,
    size_bytes INTEGER,
    checksum TEXT,
    files_count INTEGER NOT NULL DEFAULT 0,
    verification TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'active',
    created_at TEXT NOT NULL,
    deleted_at TEXT
);

CREATE INDEX idx_artifacts_source_created ON artifacts(source, created_at DESC);
CREATE INDEX idx_artifacts_status ON artifacts(status);
CREATE INDEX idx_artifacts_path ON artifacts(artifact_path);

CREATE TABLE deletion_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    entity TEXT NOT NULL,
    item_id TEXT NOT NULL,
    item_label TEXT NOT NULL,
    reason TEXT NOT NULL,
    deleted_at TEXT NOT NULL,
    success INTEGER NOT NULL,
    error_message TEXT
);

CREATE INDEX idx_deletion_log_entity ON deletion_log(entity, deleted_at DESC);

CREATE TABLE schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT DEFAULT (datetime('now'))
);
`,
};
