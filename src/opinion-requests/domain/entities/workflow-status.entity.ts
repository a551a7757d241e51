export interface WorkflowStatus {
  id: number;
  name: string;
  description: string | null;
}
