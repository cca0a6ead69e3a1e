/**
 * Remote object store contract. The store is rate-limited, occasionally slow and not linearizable;
 * adapters report failures as TransientError / PermanentError / NotFoundError (see Common/Errors).
 */

/** Kinds of objects the engine reads or creates. */
export type StoredObjectKind = `asset` | `text` | `pointer`;

/** Listing entry for one object inside a folder. */
export interface StoredObjectInfo {
    id: string;
    name: string;
    folderId: string;
    kind: StoredObjectKind;
    targetId?: string; // pointer objects only
}

export interface ListOptions {
    name?: string; // exact-name filter
    cursor?: string; // opaque continuation token from a previous page
    pageSize?: number;
}

export interface ListPage {
    objects: StoredObjectInfo[];
    nextCursor?: string;
}

/** Blob primitives consumed by the sync engine. */
export interface RemoteObjectStore {
    /** Metadata of one object. Throws NotFoundError when absent. */
    Stat(objectId: string): Promise<StoredObjectInfo>;
    /** Full text content of a text object. Throws NotFoundError when absent. */
    GetText(objectId: string): Promise<string>;
    /** Replaces the full content of an existing text object. */
    PutText(objectId: string, content: string): Promise<void>;
    /** Creates a text object in a folder and returns its id. */
    CreateText(folderId: string, name: string, content: string): Promise<string>;
    /** Creates a reference to `sourceObjectId` inside `folderId` and returns its id. */
    CreatePointer(sourceObjectId: string, folderId: string, name: string): Promise<string>;
    /** Removes an object. Throws NotFoundError when already absent. */
    Delete(objectId: string): Promise<void>;
    /** One page of a folder listing. */
    List(folderId: string, options?: ListOptions): Promise<ListPage>;
}
