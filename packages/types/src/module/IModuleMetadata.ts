/**
 * Module metadata for introspection and statistics.
 *
 * Provides identifying information about a backend module that can be used for
 * runtime introspection, logging and error attribution.
 */
export interface IModuleMetadata {
    /**
     * Unique identifier for the module.
     *
     * Should be lowercase kebab-case matching the module directory name.
     * Used for programmatic identification and logging contexts.
     *
     * @example 'connector'
     */
    id: string;

    /**
     * Human-readable module name.
     *
     * @example 'Terminal Connector'
     */
    name: string;

    /**
     * Semantic version string (major.minor.patch).
     */
    version: string;

    /**
     * Optional human-readable description of module purpose.
     */
    description?: string;
}
