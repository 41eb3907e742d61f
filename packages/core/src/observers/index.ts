export { ClusterStateObserver } from './cluster-state-observer.js';
