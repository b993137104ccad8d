export type UserRole = "READER" | "AUTHOR" | "ADMIN";

export interface AuthContext {
  userId: string;
  role: UserRole;
  isAuthenticated: boolean;
}
