export * from './record-progress.dto';
