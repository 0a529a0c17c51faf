export * from './pipeline-definition.dto';
export * from './trigger-run.dto';
