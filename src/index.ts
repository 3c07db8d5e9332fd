export * from './catalog';
export * from './codec';
export * from './config';
export * from './coordinator';
export * from './errors';
export * from './logger';
export * from './transport-session';
export { TaskQueue } from './task-queue';
