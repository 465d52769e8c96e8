/**
 * Model-Driven Client Module
 *
 * Builds service clients at run time from declarative service descriptions.
 * One description drives request serialization, response parsing, endpoint
 * resolution, request signing, retries, pagination and waiters.
 *
 * ## Quick Start
 *
 * ```typescript
 * import {
 *   ClientCreator,
 *   DEFAULT_DATA_PATH,
 *   EndpointResolver,
 *   FileLoader,
 * } from 'model-client';
 *
 * const loader = new FileLoader(['./models', DEFAULT_DATA_PATH]);
 * const creator = new ClientCreator({
 *   loader,
 *   endpointResolver: EndpointResolver.fromRules(await loader.loadData('_endpoints')),
 * });
 *
 * const widgets = await creator.createClient('widgets', 'us-west-2');
 * const { Widgets } = await widgets.operations.describeWidgets({ MaxResults: 10 });
 * ```
 *
 * ### Pagination
 *
 * ```typescript
 * const paginator = await widgets.getPaginator('DescribeWidgets');
 * for await (const page of paginator.paginate({})) {
 *   console.log(page.Widgets);
 * }
 * ```
 *
 * ### Waiters
 *
 * ```typescript
 * const waiter = await widgets.getWaiter('widget_available');
 * await waiter.wait({}, { delay: 2, maxAttempts: 10 });
 * ```
 *
 * ### Events
 *
 * ```typescript
 * widgets.meta.events.register(
 *   { event: 'before-call', service: 'widgets' },
 *   ({ params }) => { params.headers['x-trace'] = 'abc'; },
 *   'add-trace-header'
 * );
 * ```
 *
 * @module model-client
 */

// ============================================================================
// Client
// ============================================================================

export * from './client/index.js';

// ============================================================================
// Service Models
// ============================================================================

export * from './model/index.js';

// ============================================================================
// Wire Protocols
// ============================================================================

export * from './protocol/index.js';
export * from './validation/index.js';

// ============================================================================
// Endpoints and Transport
// ============================================================================

export * from './endpoint/index.js';
export * from './http/index.js';

// ============================================================================
// Signing and Credentials
// ============================================================================

export * from './signing/index.js';
export * from './credentials/index.js';

// ============================================================================
// Events and Retries
// ============================================================================

export * from './events/index.js';
export * from './retry/index.js';

// ============================================================================
// Pagination, Waiters and Polling
// ============================================================================

export * from './paginate/index.js';
export * from './waiter/index.js';
export * from './poll/index.js';

// ============================================================================
// Configuration, Errors and Logging
// ============================================================================

export * from './config/index.js';
export * from './error/index.js';
export * from './observability/index.js';

// ============================================================================
// Testing
// ============================================================================

export * from './testing/index.js';
