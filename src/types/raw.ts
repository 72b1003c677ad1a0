export type RawValue = string | number | boolean;

// Key/value pairs of one section or subsection, as the user wrote them.
export type RawSettings = Readonly<Record<string, RawValue>>;

export type RawEntry = readonly [header: string, settings: RawSettings];

/**
 * The document handed to the resolver. File readers produce the entry list so
 * that a repeated header is still visible; programmatic callers may pass a
 * plain mapping.
 */
export type RawDocument = Readonly<Record<string, RawSettings>> | readonly RawEntry[];

export function documentEntries(doc: RawDocument): readonly RawEntry[] {
    if (isEntryList(doc)) {
        return doc;
    }
    return Object.entries(doc);
}

function isEntryList(doc: RawDocument): doc is readonly RawEntry[] {
    return Array.isArray(doc);
}
