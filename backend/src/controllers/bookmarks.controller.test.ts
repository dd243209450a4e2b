import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createBookmarksController, readBookmarks, readClientVersion } from './bookmarks.controller';
import { SyncAdmission } from '../services/syncAdmission';
import { IN_MEMORY, SyncStore } from '../store/syncStore';
import { NotAcceptingError, NotFoundError, StorageError, ValidationError } from '../utils/errors';
import { mockNext, mockRequest, mockResponse } from '../test/httpMocks';
import logger from '../utils/logger';

describe('readClientVersion', () => {
  it('should default to an empty version', () => {
    expect(readClientVersion(undefined)).toBe('');
    expect(readClientVersion({})).toBe('');
    expect(readClientVersion({ version: null })).toBe('');
  });

  it('should return a string version', () => {
    expect(readClientVersion({ version: '1.5.2' })).toBe('1.5.2');
  });

  it('should reject bodies that are not objects', () => {
    expect(() => readClientVersion(['1.0.0'])).toThrow(ValidationError);
    expect(() => readClientVersion('1.0.0')).toThrow(ValidationError);
  });

  it('should reject a non-string version', () => {
    expect(() => readClientVersion({ version: 15 })).toThrow('Client version must be a string');
  });
});

describe('readBookmarks', () => {
  it('should return the payload untouched', () => {
    expect(readBookmarks({ bookmarks: 'U2FsdGVkX1+abc==' })).toBe('U2FsdGVkX1+abc==');
    expect(readBookmarks({ bookmarks: '' })).toBe('');
  });

  it.each([[undefined], [{}], [{ bookmarks: 42 }], [[]]])('should reject %j', (body) => {
    expect(() => readBookmarks(body)).toThrow('No bookmarks provided');
  });
});

describe('bookmarks controller', () => {
  let store: SyncStore;
  let admission: SyncAdmission;
  let controller: ReturnType<typeof createBookmarksController>;

  beforeEach(() => {
    store = SyncStore.open({ file: IN_MEMORY, initTimeoutSeconds: 1 });
    admission = new SyncAdmission(true);
    controller = createBookmarksController({ store, admission });
  });

  afterEach(() => {
    store.close();
  });

  const create = (version: string) => {
    const { res, recorded } = mockResponse();
    const next = mockNext();
    controller.createBookmarks(mockRequest({ method: 'POST', body: { version } }), res, next);
    return { recorded, next };
  };

  describe('createBookmarks', () => {
    it('should return the new sync ID, timestamp and version', () => {
      const { recorded, next } = create('1.0.0');

      expect(next).not.toHaveBeenCalled();
      expect(recorded.statusCode).toBe(200);
      expect(recorded.body).toEqual({
        id: expect.stringMatching(/^[0-9a-f]{32}$/),
        lastUpdated: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?Z$/),
        version: '1.0.0',
      });
      expect(store.getStats().recordCount).toBe(1);
    });

    it('should keep the new sync ID out of info logs', () => {
      const info = vi.spyOn(logger, 'info');

      const { recorded } = create('1.0.0');

      expect(recorded.statusCode).toBe(200);
      expect(info).not.toHaveBeenCalled();
      info.mockRestore();
    });

    it('should refuse new syncs while admission is closed', () => {
      admission.setAccepting(false);

      const { recorded, next } = create('1.0.0');

      expect(next).toHaveBeenCalledWith(expect.any(NotAcceptingError));
      expect(recorded.body).toBeUndefined();
      expect(store.getStats().recordCount).toBe(0);
    });

    it('should pass validation failures to the error handler', () => {
      const next = mockNext();

      controller.createBookmarks(mockRequest({ method: 'POST', body: { version: 3 } }), mockResponse().res, next);

      expect(next).toHaveBeenCalledWith(expect.any(ValidationError));
    });
  });

  describe('getBookmarks', () => {
    it('should return payload, timestamp and version', () => {
      const created = store.createSync('1.0.0');
      const { lastUpdated } = store.putSync(created.id, 'ENCBLOB');
      const { res, recorded } = mockResponse();

      controller.getBookmarks(mockRequest({ params: { id: created.id } }), res, mockNext());

      expect(recorded.statusCode).toBe(200);
      expect(recorded.body).toEqual({ bookmarks: 'ENCBLOB', lastUpdated, version: '1.0.0' });
    });

    it('should report unknown IDs as not found', () => {
      const next = mockNext();

      controller.getBookmarks(
        mockRequest({ params: { id: 'deadbeefdeadbeefdeadbeefdeadbeef' } }),
        mockResponse().res,
        next
      );

      expect(next).toHaveBeenCalledWith(expect.any(NotFoundError));
    });
  });

  describe('updateBookmarks', () => {
    it('should store the payload and return the new timestamp', () => {
      const created = store.createSync('1.0.0');
      const { res, recorded } = mockResponse();

      controller.updateBookmarks(
        mockRequest({ method: 'PUT', params: { id: created.id }, body: { bookmarks: 'ENCBLOB' } }),
        res,
        mockNext()
      );

      expect(recorded.statusCode).toBe(200);
      expect(recorded.body).toEqual({ lastUpdated: store.getLastUpdated(created.id) });
      expect(store.getSync(created.id).payload).toBe('ENCBLOB');
    });

    it('should reject a body without bookmarks and leave the record alone', () => {
      const created = store.createSync('1.0.0');
      const next = mockNext();

      controller.updateBookmarks(
        mockRequest({ method: 'PUT', params: { id: created.id }, body: { version: '1.0.0' } }),
        mockResponse().res,
        next
      );

      expect(next).toHaveBeenCalledWith(expect.any(ValidationError));
      expect(store.getSync(created.id).lastUpdated).toBe(created.lastUpdated);
    });

    it('should forward storage failures', () => {
      store.close();
      const next = mockNext();

      controller.updateBookmarks(
        mockRequest({ method: 'PUT', params: { id: 'a'.repeat(32) }, body: { bookmarks: 'x' } }),
        mockResponse().res,
        next
      );

      expect(next).toHaveBeenCalledWith(expect.any(StorageError));
    });
  });

  describe('getLastUpdated', () => {
    it('should return the timestamp of a known ID', () => {
      const created = store.createSync('1.0.0');
      const { res, recorded } = mockResponse();

      controller.getLastUpdated(mockRequest({ params: { id: created.id } }), res, mockNext());

      expect(recorded.body).toEqual({ lastUpdated: created.lastUpdated });
    });

    it('should return an empty object for an unknown ID', () => {
      const { res, recorded } = mockResponse();

      controller.getLastUpdated(mockRequest({ params: { id: 'deadbeefdeadbeefdeadbeefdeadbeef' } }), res, mockNext());

      expect(recorded.statusCode).toBe(200);
      expect(recorded.body).toEqual({});
    });
  });

  describe('getVersion', () => {
    it('should return the creating client version', () => {
      const created = store.createSync('1.2.0');
      const { res, recorded } = mockResponse();

      controller.getVersion(mockRequest({ params: { id: created.id } }), res, mockNext());

      expect(recorded.body).toEqual({ version: '1.2.0' });
    });

    it('should return an empty object for unknown IDs and empty versions', () => {
      const created = store.createSync('');
      const unknown = mockResponse();
      const empty = mockResponse();

      controller.getVersion(mockRequest({ params: { id: 'deadbeefdeadbeefdeadbeefdeadbeef' } }), unknown.res, mockNext());
      controller.getVersion(mockRequest({ params: { id: created.id } }), empty.res, mockNext());

      expect(unknown.recorded.body).toEqual({});
      expect(empty.recorded.body).toEqual({});
    });
  });

  it('should serve the create, update, read round trip', () => {
    const createdResponse = create('1.0.0').recorded.body;
    const { id } = createdResponse as { id: string };

    const put = mockResponse();
    controller.updateBookmarks(
      mockRequest({ method: 'PUT', params: { id }, body: { bookmarks: 'ENCBLOB' } }),
      put.res,
      mockNext()
    );
    const { lastUpdated } = put.recorded.body as { lastUpdated: string };

    const read = mockResponse();
    controller.getBookmarks(mockRequest({ params: { id } }), read.res, mockNext());

    expect(read.recorded.body).toEqual({ bookmarks: 'ENCBLOB', lastUpdated, version: '1.0.0' });
  });
});
