import postgres from "postgres";

export type Sql = postgres.Sql;

export function createSql(connectionString: string): Sql {
  return postgres(connectionString, {
    max: 20,
    idle_timeout: 20,
    transform: {
      undefined: null,
    },
  });
}
