export interface RequestDocument {
  id: number;
  requestId: number;
  fileName: string;
  storedName: string;
  filePath: string;
  fileType: string;
  fileSize: number;
  uploadedBy: number;
  remarks: string | null;
  createdAt: Date;
}

export type NewRequestDocument = Omit<RequestDocument, 'id' | 'createdAt'>;
