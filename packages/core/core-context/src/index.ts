export { RequestContext } from './RequestContext';
