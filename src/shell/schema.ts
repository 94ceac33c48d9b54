/**
 * SHELL: Store Schema
 * The persisted layout is a public contract: status and audit tooling reads
 * these tables directly. No row of the work tree is ever deleted; archival is the only terminal step.
 */

export const SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS project (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  name TEXT NOT NULL,
  purpose TEXT NOT NULL DEFAULT '',
  status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'complete', 'archived')),
  last_known_git_hash TEXT,
  last_git_sync TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS completion_paths (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'in_progress', 'completed')),
  order_index INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS milestones (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  completion_path_id INTEGER NOT NULL REFERENCES completion_paths(id),
  name TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'in_progress', 'completed')),
  order_index INTEGER NOT NULL,
  completed_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS tasks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  milestone_id INTEGER NOT NULL REFERENCES milestones(id),
  name TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'in_progress', 'completed')),
  priority TEXT NOT NULL DEFAULT 'medium' CHECK (priority IN ('low', 'medium', 'high', 'critical')),
  order_index INTEGER NOT NULL,
  forced INTEGER NOT NULL DEFAULT 0 CHECK (forced IN (0, 1)),
  completed_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS subtasks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  parent_task_id INTEGER NOT NULL REFERENCES tasks(id),
  name TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'in_progress', 'completed')),
  priority TEXT NOT NULL DEFAULT 'high' CHECK (priority IN ('low', 'medium', 'high', 'critical')),
  order_index INTEGER NOT NULL,
  completed_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sidequests (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  paused_task_id INTEGER NOT NULL REFERENCES tasks(id),
  paused_subtask_id INTEGER REFERENCES subtasks(id),
  name TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'in_progress', 'completed')),
  priority TEXT NOT NULL DEFAULT 'critical' CHECK (priority IN ('low', 'medium', 'high', 'critical')),
  completed_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS items (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  task_id INTEGER NOT NULL REFERENCES tasks(id),
  subtask_id INTEGER REFERENCES subtasks(id),
  sidequest_id INTEGER REFERENCES sidequests(id),
  description TEXT NOT NULL,
  done INTEGER NOT NULL DEFAULT 0 CHECK (done IN (0, 1)),
  order_index INTEGER NOT NULL,
  completed_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  CHECK (subtask_id IS NULL OR sidequest_id IS NULL)
);

CREATE TABLE IF NOT EXISTS notes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  note_type TEXT NOT NULL CHECK (note_type IN (
    'clarification', 'decision', 'analysis', 'task_context', 'external',
    'warning', 'error', 'info', 'summary'
  )),
  message TEXT NOT NULL,
  reference_table TEXT CHECK (reference_table IN (
    'project', 'completion_paths', 'milestones', 'tasks', 'subtasks', 'sidequests', 'items'
  )),
  reference_id INTEGER,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_milestones_path ON milestones(completion_path_id, order_index);
CREATE INDEX IF NOT EXISTS idx_tasks_milestone ON tasks(milestone_id, order_index);
CREATE INDEX IF NOT EXISTS idx_subtasks_task ON subtasks(parent_task_id, order_index);
CREATE INDEX IF NOT EXISTS idx_sidequests_task ON sidequests(paused_task_id, status);
CREATE INDEX IF NOT EXISTS idx_items_task ON items(task_id, order_index);
CREATE INDEX IF NOT EXISTS idx_items_subtask ON items(subtask_id);
CREATE INDEX IF NOT EXISTS idx_items_sidequest ON items(sidequest_id);
CREATE INDEX IF NOT EXISTS idx_notes_type ON notes(note_type, created_at);

CREATE TRIGGER IF NOT EXISTS notes_no_update BEFORE UPDATE ON notes
BEGIN
  SELECT RAISE(ABORT, 'notes are append-only');
END;

CREATE TRIGGER IF NOT EXISTS notes_no_delete BEFORE DELETE ON notes
BEGIN
  SELECT RAISE(ABORT, 'notes are append-only');
END;

CREATE TRIGGER IF NOT EXISTS project_no_delete BEFORE DELETE ON project
BEGIN
  SELECT RAISE(ABORT, 'project rows are archived, never deleted');
END;

CREATE TRIGGER IF NOT EXISTS completion_paths_no_delete BEFORE DELETE ON completion_paths
BEGIN
  SELECT RAISE(ABORT, 'completion paths are never deleted');
END;

CREATE TRIGGER IF NOT EXISTS milestones_no_delete BEFORE DELETE ON milestones
BEGIN
  SELECT RAISE(ABORT, 'milestones are never deleted');
END;

CREATE TRIGGER IF NOT EXISTS tasks_no_delete BEFORE DELETE ON tasks
BEGIN
  SELECT RAISE(ABORT, 'tasks are never deleted');
END;

CREATE TRIGGER IF NOT EXISTS subtasks_no_delete BEFORE DELETE ON subtasks
BEGIN
  SELECT RAISE(ABORT, 'subtasks are never deleted');
END;

CREATE TRIGGER IF NOT EXISTS sidequests_no_delete BEFORE DELETE ON sidequests
BEGIN
  SELECT RAISE(ABORT, 'sidequests are never deleted');
END;

CREATE TRIGGER IF NOT EXISTS items_no_delete BEFORE DELETE ON items
BEGIN
  SELECT RAISE(ABORT, 'items are never deleted');
END;
`;
