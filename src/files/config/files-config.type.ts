export type FilesConfig = {
  uploadDir: string;
  maxFileSizeMb: number;
  allowedExtensions: string[];
};
