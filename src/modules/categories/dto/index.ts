export * from './category.dto';
