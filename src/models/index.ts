export { default as Business } from './Business'
export { default as Ad } from './Ad'
export { default as Campaign } from './Campaign'
export { default as Registration } from './Registration'
