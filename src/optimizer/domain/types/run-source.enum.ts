export enum RunSource {
  JSON = 'json',
  CSV = 'csv',
}
