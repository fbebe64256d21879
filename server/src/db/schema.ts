import { MEDIA_FORMATS } from './db.js';

const FORMAT_LIST = MEDIA_FORMATS.map((f) => `'${f}'`).join(',');

/** SQL schema for the media table. */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS media (
  id        INTEGER PRIMARY KEY AUTOINCREMENT,
  title     TEXT NOT NULL,
  artist    TEXT NOT NULL,
  location  TEXT NOT NULL,
  format    TEXT NOT NULL CHECK(format IN (${FORMAT_LIST}))
);
`;
