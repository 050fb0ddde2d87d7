export { AsyncIterableSource } from './async-iterable-source';
export type { AsyncIterableSourceOptions } from './async-iterable-source';
export { ScriptedSource } from './scripted-source';
export type { ScriptStep, ScriptedSourceOptions } from './scripted-source';
