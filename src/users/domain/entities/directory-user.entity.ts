/**
 * Identity attributes the workflow needs when validating an expert.
 */
export interface DirectoryUser {
  id: number;
  isActive: boolean;
  departmentId: number | null;
}
