import type { MediaRepository, NewMediaItem } from './db.js';

/** Demo records inserted into an empty collection on first start. */
export const SAMPLE_MEDIA: readonly NewMediaItem[] = [
    { title: 'Dark Side of the Moon', artist: 'Pink Floyd', location: 'Shelf Rock', format: 'Vinyl' },
    { title: 'Kind of Blue', artist: 'Miles Davis', location: 'Shelf Jazz', format: 'Vinyl' },
    { title: 'Blue Lines', artist: 'Massive Attack', location: 'Rack A1', format: 'CD' },
    { title: 'Rumours', artist: 'Fleetwood Mac', location: 'Shelf Rock', format: 'Tape' },
    { title: 'Homogenic', artist: 'Björk', location: 'Rack A3', format: 'CD' },
    { title: 'Songs in the Key of Life', artist: 'Stevie Wonder', location: 'Crate 2', format: 'Vinyl' },
];

/**
 * Insert `items` only when the store holds no records.
 * Returns how many were inserted (0 when the store already had data).
 */
export function seedIfEmpty(repo: MediaRepository, items: readonly NewMediaItem[] = SAMPLE_MEDIA): number {
    if (repo.count() > 0) return 0;
    for (const item of items) repo.create(item);
    return items.length;
}
