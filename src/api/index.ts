export { link } from './link.js'
export { status } from './status.js'
export { verify } from '../verify/verify.js'
