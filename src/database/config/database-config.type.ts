export type DatabaseConfig = {
  path: string; // ':memory:' keeps the database in process
  dropSchema: boolean;
};
