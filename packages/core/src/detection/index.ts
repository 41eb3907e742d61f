export { classifyPods, type ClassifierThresholds } from './issue-classifier.js';
