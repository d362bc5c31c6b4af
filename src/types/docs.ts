export type StoredFile = {
  path: string;
  url: string;
  contentType: string;
  isPublic: boolean;
  size: number;
  added: string;
};

export type StoredFileWithBody = StoredFile & { body: string };
