export * from './dataverse-client.service';
export * from './directory-lookup.service';
export * from './user-provisioning.service';
export * from './environment-bootstrap.service';
export * from './test-execution.service';
export * from './failure-analysis.service';
export * from './artifact.service';
export * from './orchestrator.service';
export { logger, registerSecret } from './logger.service';
