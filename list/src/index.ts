export { LinkedList, type Identifiable } from './list';
export { Position, comparePositions, type Location } from './position';
export { EmptyListError, ForeignPositionError, OutOfRangeError } from './errors';
export { debugConfig, WARN_ON_CLONE } from './debug';
