export class NoteStoreNotFoundError extends Error {
  constructor(dbPath: string) {
    super(
      `Apple Notes database not found at ${dbPath}. ` +
        'Make sure this runs on macOS with Apple Notes set up, ' +
        'or point NOTESTORE_DB_PATH at a copy.',
    );
    this.name = 'NoteStoreNotFoundError';
  }
}

/** The database exists but could not be opened, usually for lack of Full Disk Access. */
export class NoteStoreAccessError extends Error {
  constructor(dbPath: string, reason: string) {
    super(
      `Cannot read Apple Notes database at ${dbPath}: ${reason}. ` +
        'Grant Full Disk Access to your terminal in System Settings > Privacy & Security, ' +
        'or copy NoteStore.sqlite somewhere readable.',
    );
    this.name = 'NoteStoreAccessError';
  }
}

export class NoteStoreReadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NoteStoreReadError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
