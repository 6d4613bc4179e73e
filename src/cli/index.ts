export * from './Command';
export * from './Console';
export * from './Controller';
export * from './IConsole';
