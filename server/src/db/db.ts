/**
 * MediaItem — one physical record in the collection (CD, vinyl or tape).
 * `id` is assigned by the store and never reused.
 */
export interface MediaItem {
  id: number;
  title: string;
  artist: string;
  location: string;
  format: MediaFormat;
}

export const MEDIA_FORMATS = ['CD', 'Vinyl', 'Tape'] as const;
export type MediaFormat = (typeof MEDIA_FORMATS)[number];

/** Fields a client supplies when adding an item. */
export type NewMediaItem = Omit<MediaItem, 'id'>;

/**
 * MediaRepository — abstract interface for persistence.
 * Implement this for SQLite, Postgres, or any other backend.
 */
export interface MediaRepository {
  /** Initialize the database (create tables, etc.) */
  init(): void;

  /** All items in insertion order */
  list(): MediaItem[];

  /** Get a single item by ID */
  getById(id: number): MediaItem | null;

  /** Add a new item. Returns the created item with its assigned id. */
  create(item: NewMediaItem): MediaItem;

  /** Remove an item by ID. Returns false when nothing had that id. */
  remove(id: number): boolean;

  /**
   * Case-insensitive substring match over title, artist, location and format.
   * An empty or whitespace-only query matches every item.
   */
  search(query: string): MediaItem[];

  /** Number of stored items */
  count(): number;

  /** Release the underlying handle */
  close(): void;
}
