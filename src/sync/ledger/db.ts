import Database from "better-sqlite3";
import path from "path";
import { getEnv } from "@/sync/config/env";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS projects (
  gid TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  owner_gid TEXT,
  owner_name TEXT,
  due_date TEXT,
  status TEXT,
  calculated_progress REAL NOT NULL DEFAULT 0,
  last_status_update_at TEXT,
  last_status_update_by TEXT,
  last_activity_at TEXT,
  total_tasks INTEGER NOT NULL DEFAULT 0,
  completed_tasks INTEGER NOT NULL DEFAULT 0,
  tasks_created_last_7d INTEGER NOT NULL DEFAULT 0,
  tasks_completed_last_7d INTEGER NOT NULL DEFAULT 0,
  tasks_modified_last_7d INTEGER NOT NULL DEFAULT 0,
  start_date TEXT,
  planned_end_date TEXT,
  planned_hours_total REAL,
  effective_hours_total REAL,
  pmo_id TEXT,
  sponsor TEXT,
  client_name TEXT,
  project_lead TEXT,
  project_type TEXT,
  country TEXT,
  business_vertical TEXT,
  project_phase TEXT,
  in_billing_plan INTEGER,
  completed_flag INTEGER NOT NULL DEFAULT 0,
  raw_data TEXT NOT NULL,
  synced_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS project_changelog (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_gid TEXT NOT NULL REFERENCES projects(gid),
  field_name TEXT NOT NULL,
  old_value TEXT,
  new_value TEXT,
  detected_at TEXT NOT NULL,
  sync_id TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_changelog_project ON project_changelog(project_gid, detected_at);

CREATE TABLE IF NOT EXISTS findings (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_gid TEXT NOT NULL,
  rule_id TEXT NOT NULL,
  severity TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'open',
  details TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL,
  acknowledged_at TEXT,
  acknowledged_by TEXT,
  ack_comment TEXT,
  resolved_at TEXT,
  notified_at TEXT,
  notified_severity TEXT
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_findings_active
  ON findings(project_gid, rule_id) WHERE status IN ('open', 'acknowledged');
CREATE INDEX IF NOT EXISTS idx_findings_status ON findings(status);

CREATE TABLE IF NOT EXISTS status_updates (
  gid TEXT PRIMARY KEY,
  project_gid TEXT NOT NULL,
  author_gid TEXT,
  author_name TEXT,
  created_at TEXT,
  status_type TEXT,
  title TEXT,
  text TEXT,
  html_text TEXT,
  raw_data TEXT NOT NULL,
  synced_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_status_updates_project ON status_updates(project_gid, created_at);

CREATE TABLE IF NOT EXISTS status_update_comments (
  gid TEXT PRIMARY KEY,
  status_update_gid TEXT NOT NULL,
  project_gid TEXT NOT NULL,
  author_gid TEXT,
  author_name TEXT,
  created_at TEXT,
  text TEXT,
  html_text TEXT,
  raw_data TEXT NOT NULL,
  synced_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sync_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  sync_id TEXT NOT NULL UNIQUE,
  source TEXT NOT NULL DEFAULT 'asana',
  started_at TEXT NOT NULL,
  completed_at TEXT,
  projects_synced INTEGER,
  changes_detected INTEGER,
  findings_created INTEGER,
  counts_json TEXT NOT NULL DEFAULT '{}',
  status TEXT NOT NULL,
  error_message TEXT
);

CREATE TABLE IF NOT EXISTS projects_history (
  gid TEXT PRIMARY KEY,
  name TEXT,
  owner_gid TEXT,
  owner_name TEXT,
  status TEXT,
  last_status_update_at TEXT,
  last_status_update_by TEXT,
  pmo_id TEXT,
  sponsor TEXT,
  client_name TEXT,
  project_lead TEXT,
  business_vertical TEXT,
  project_phase TEXT,
  completed_flag INTEGER NOT NULL DEFAULT 0,
  search_text TEXT NOT NULL DEFAULT '',
  raw_data TEXT NOT NULL,
  snapshot_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS inaccessible_projects (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_gid TEXT NOT NULL,
  project_name TEXT,
  reason TEXT NOT NULL,
  detail TEXT,
  sync_id TEXT NOT NULL,
  detected_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS clockify_projects (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  client_name TEXT,
  archived INTEGER NOT NULL DEFAULT 0,
  synced_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS clockify_people (
  id TEXT PRIMARY KEY,
  name TEXT,
  email TEXT,
  status TEXT,
  synced_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS clockify_time_entries (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  project_id TEXT,
  description TEXT,
  start_at TEXT NOT NULL,
  end_at TEXT,
  hours REAL NOT NULL,
  entry_date TEXT NOT NULL,
  billable INTEGER NOT NULL DEFAULT 0,
  synced_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_time_entries_project ON clockify_time_entries(project_id, entry_date);
`;

let _db: Database.Database | null = null;

/** Open a database and make sure the schema exists. `":memory:"` is accepted. */
export function openDatabase(filename: string): Database.Database {
  const db = new Database(filename);
  if (filename !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);
  return db;
}

export function getDatabase(): Database.Database {
  if (!_db) {
    _db = openDatabase(path.resolve(getEnv().SYNC_DB_PATH));
  }
  return _db;
}

export function closeDatabase(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}
