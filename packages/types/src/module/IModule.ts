import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for backend components.
 *
 * Modules follow a two-phase lifecycle so every module is prepared before any
 * of them starts serving:
 *
 * - `init(dependencies)` stores injected services, builds internal services
 *   and loads state. It must not mount routes.
 * - `run()` integrates with the application: mounts routers on the injected
 *   Express app and starts anything long-lived.
 *
 * A failure in either phase is fatal to startup.
 *
 * @example
 * ```typescript
 * const pagesModule = new PagesModule();
 * await pagesModule.init({ database, app });
 * await pagesModule.run();
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = Record<string, unknown>> {
    /**
     * Identifying information used in logs.
     */
    readonly metadata: IModuleMetadata;

    init(dependencies: TDependencies): Promise<void>;

    run(): Promise<void>;
}
