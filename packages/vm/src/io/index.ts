export * from './channel'
export * from './interactive'
export * from './painting-robot'
export * from './scripted'
