export * from './backup';
export * from './remote-ssh';
