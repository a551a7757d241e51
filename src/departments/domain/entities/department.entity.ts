export interface Department {
  id: number;
  name: string;
  code: string;
}
