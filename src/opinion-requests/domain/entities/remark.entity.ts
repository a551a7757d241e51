export interface Remark {
  id: number;
  requestId: number;
  userId: number;
  content: string;
  createdAt: Date;
}

export type NewRemark = Omit<Remark, 'id' | 'createdAt'>;
