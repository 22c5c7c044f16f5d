export { Filter, Service } from './Filter';
export { FilterChain } from './FilterChain';
export { MethodMeta, RouteMeta } from './MethodMeta';
export { ResponseWrapper } from './ResponseWrapper';
