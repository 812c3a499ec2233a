import type { UserRecord } from "../db/users";

export type AppVariables = {
  requestId: string;
  user: UserRecord | undefined;
};

declare module "hono" {
  interface ContextVariableMap extends AppVariables {}
}
