export {
  CsvDirectoryDataSource,
  openCsvDirectory,
  loadRecordSets,
  TABLE_COLUMNS,
  type DataSource,
  type TableName,
  type RawRow,
} from './dataSource';
export { JsonFileArtifactStore, type ModelArtifactStore } from './artifactStore';
export { ResourceCache, createResourceCache, sharedResources } from './resources';
