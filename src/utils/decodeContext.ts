/**
 * Decode context management
 *
 * Provides utilities for creating and managing decode-scoped context,
 * including breadcrumb trails for following a single post through the
 * resolver and decoders.
 */
import { AsyncLocalStorage } from 'node:async_hooks';
import { v4 as uuidv4 } from 'uuid';
import { LoggingConfigurationManager } from '../config/LoggingConfigurationManager';

/**
 * Breadcrumb for tracking events during a decode
 */
export interface Breadcrumb {
  timestamp: number;       // When this event occurred
  category: string;        // Component/category name
  message: string;         // Event description
  data?: Record<string, unknown>;
  durationMs?: number;     // Duration since last breadcrumb
  elapsedMs: number;       // Time since the decode started
}

/**
 * Context for one decode operation
 */
export interface DecodeContext {
  operationId: string;
  postId?: number;
  startTime: number;
  breadcrumbs: Breadcrumb[];
  componentTiming: Record<string, number>; // Time spent in each component
}

const contextStorage = new AsyncLocalStorage<DecodeContext>();

export function createDecodeContext(postId?: number, operationId: string = uuidv4()): DecodeContext {
  return {
    operationId,
    postId,
    startTime: performance.now(),
    breadcrumbs: [],
    componentTiming: {}
  };
}

/**
 * Get the context of the decode currently running, if any
 */
export function getCurrentContext(): DecodeContext | undefined {
  return contextStorage.getStore();
}

/**
 * Run a function with the given context as the current one
 */
export function runWithDecodeContext<T>(context: DecodeContext, fn: () => T): T {
  return contextStorage.run(context, fn);
}

/**
 * Add a new breadcrumb to the decode context
 * @returns The created breadcrumb
 */
export function addBreadcrumb(
  context: DecodeContext,
  category: string,
  message: string,
  data?: Record<string, unknown>
): Breadcrumb {
  const timestamp = performance.now();
  const breadcrumb: Breadcrumb = {
    timestamp,
    category,
    message,
    data,
    elapsedMs: timestamp - context.startTime
  };

  const { enabled, maxItems } = LoggingConfigurationManager.getInstance().getBreadcrumbConfig();
  if (!enabled) {
    return breadcrumb;
  }

  const previous = context.breadcrumbs[context.breadcrumbs.length - 1];
  if (previous) {
    breadcrumb.durationMs = timestamp - previous.timestamp;
    context.componentTiming[category] =
      (context.componentTiming[category] ?? 0) + breadcrumb.durationMs;
  }

  context.breadcrumbs.push(breadcrumb);
  if (context.breadcrumbs.length > maxItems) {
    context.breadcrumbs = context.breadcrumbs.slice(-maxItems);
  }

  return breadcrumb;
}

/**
 * Summary of where time went during a decode
 */
export function getPerformanceMetrics(context: DecodeContext) {
  return {
    totalElapsedMs: performance.now() - context.startTime,
    componentTiming: context.componentTiming,
    breadcrumbCount: context.breadcrumbs.length
  };
}
