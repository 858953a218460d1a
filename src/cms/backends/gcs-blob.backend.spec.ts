import { StorageException } from '../../common/errors/service.exception';
import { GcsBlobBackend } from './gcs-blob.backend';

const mockSave = jest.fn();
const mockDownload = jest.fn();
const mockGetMetadata = jest.fn();
const mockExists = jest.fn();
const mockDelete = jest.fn();
const mockGetFiles = jest.fn();
const mockDeleteFiles = jest.fn();
const mockFile = jest.fn((name: string) => ({
  name,
  save: mockSave,
  download: mockDownload,
  getMetadata: mockGetMetadata,
  exists: mockExists,
  delete: mockDelete,
}));

jest.mock('@google-cloud/storage', () => ({
  Storage: jest.fn().mockImplementation(() => ({
    bucket: () => ({ file: mockFile, getFiles: mockGetFiles, deleteFiles: mockDeleteFiles }),
  })),
}));

function apiError(code: number): Error {
  return Object.assign(new Error(`status ${code}`), { code });
}

describe('GcsBlobBackend', () => {
  let backend: GcsBlobBackend;

  beforeEach(() => {
    jest.clearAllMocks();
    backend = new GcsBlobBackend({ projectId: 'test-project', bucket: 'shop-content' });
  });

  it('saves with the content type', async () => {
    mockSave.mockResolvedValue(undefined);

    await backend.put('DEFAULT/IMAGE/a.png', Buffer.from('a'), 'image/png');

    expect(mockFile).toHaveBeenCalledWith('DEFAULT/IMAGE/a.png');
    expect(mockSave).toHaveBeenCalledWith(Buffer.from('a'), { contentType: 'image/png', resumable: false });
  });

  it('downloads content and metadata', async () => {
    mockDownload.mockResolvedValue([Buffer.from('hello')]);
    mockGetMetadata.mockResolvedValue([{ contentType: 'text/plain' }]);

    const blob = await backend.get('DEFAULT/STATIC_FILE/a.txt');

    expect(blob).toEqual({ key: 'DEFAULT/STATIC_FILE/a.txt', content: Buffer.from('hello'), mimeType: 'text/plain', size: 5 });
  });

  it('returns null for a 404 and wraps other errors', async () => {
    mockDownload.mockRejectedValueOnce(apiError(404)).mockRejectedValueOnce(apiError(403));

    await expect(backend.get('DEFAULT/IMAGE/none.png')).resolves.toBeNull();
    await expect(backend.get('DEFAULT/IMAGE/secret.png')).rejects.toBeInstanceOf(StorageException);
  });

  it('lists every page of a prefix', async () => {
    mockGetFiles.mockResolvedValue([[{ name: 'DEFAULT/IMAGE/b.png' }, { name: 'DEFAULT/IMAGE/a.png' }]]);

    await expect(backend.list('DEFAULT/IMAGE/')).resolves.toEqual(['DEFAULT/IMAGE/a.png', 'DEFAULT/IMAGE/b.png']);
    expect(mockGetFiles).toHaveBeenCalledWith({ prefix: 'DEFAULT/IMAGE/', autoPaginate: true });
  });

  it('deletes by prefix in one call', async () => {
    mockGetFiles.mockResolvedValue([[{ name: 'DEFAULT/IMAGE/a.png' }, { name: 'DEFAULT/LOGO/logo.png' }]]);
    mockDeleteFiles.mockResolvedValue(undefined);

    await expect(backend.deletePrefix('DEFAULT/')).resolves.toBe(2);
    expect(mockDeleteFiles).toHaveBeenCalledWith({ prefix: 'DEFAULT/', force: true });
  });

  it('skips the delete call for an empty prefix', async () => {
    mockGetFiles.mockResolvedValue([[]]);

    await expect(backend.deletePrefix('EMPTY/')).resolves.toBe(0);
    expect(mockDeleteFiles).not.toHaveBeenCalled();
  });

  it('builds storage.googleapis.com URLs', () => {
    expect(backend.publicUrl('DEFAULT/IMAGE/a.png')).toBe('https://storage.googleapis.com/shop-content/DEFAULT/IMAGE/a.png');
  });
});
