/**
 * Identifying information for a backend module.
 */
export interface IModuleMetadata {
    /**
     * Stable kebab-case identifier (e.g. 'pages').
     */
    id: string;

    name: string;

    version: string;

    description?: string;
}
