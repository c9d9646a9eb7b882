import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for backend system components.
 *
 * Modules are permanent backend components that initialize during application
 * bootstrap and remain active for the application's lifetime. They cannot be
 * enabled or disabled at runtime.
 *
 * ## Two-Phase Lifecycle
 *
 * ### Phase 1: init(dependencies)
 * - **Purpose**: Prepare the module without starting it
 * - **Actions**: Create service instances, validate config, store dependencies
 * - **Constraints**: Cannot assume other modules are initialized
 * - **Error behavior**: Failures cause application shutdown (fatal)
 *
 * ### Phase 2: run()
 * - **Purpose**: Activate the module and integrate with the application
 * - **Actions**: Mount routes, register with services
 * - **Constraints**: All dependencies are guaranteed to be initialized and ready
 * - **Error behavior**: Failures cause application shutdown (fatal)
 *
 * ## Inversion of Control
 *
 * Modules receive the Express app and the connector configuration as
 * dependencies. They attach themselves (mounting routers) rather than
 * returning values for the bootstrap process to wire up.
 *
 * ```typescript
 * class ConnectorModule implements IModule<IConnectorModuleDependencies> {
 *     readonly metadata: IModuleMetadata = {
 *         id: 'connector',
 *         name: 'Terminal Connector',
 *         version: '1.0.0'
 *     };
 *
 *     async init(deps: IConnectorModuleDependencies): Promise<void> {
 *         this.app = deps.app;
 *         this.dispatcher = new QueryDispatcher(deps.config.registry, ...);
 *     }
 *
 *     async run(): Promise<void> {
 *         this.app.use('/api/widgets', requireCredential(this.guard), createApiRouter(this.controller));
 *     }
 * }
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = Record<string, unknown>> {
    /**
     * Module metadata for introspection.
     *
     * Used for logging and debugging. Should be a readonly property set during
     * module construction.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Initialize the module with injected dependencies.
     *
     * The init phase should store injected dependencies, create service
     * instances and validate configuration. It must NOT mount routes on the
     * Express app; that happens in run().
     *
     * @param dependencies - Typed dependencies object specific to this module
     * @throws {Error} If initialization fails (causes application shutdown)
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Run the module after all modules have initialized.
     *
     * Mounts routes on the stored Express app. By the time run() is called
     * every module has completed init().
     *
     * @throws {Error} If activation fails (causes application shutdown)
     */
    run(): Promise<void>;
}
