export {
  ConsoleObserver,
  createConsoleObserver,
  silentObserver,
  type ConsoleObserverOptions,
} from './console-observer.js';
