import type { IComponent, IComponentCreateInput, IComponentUpdateInput } from './IComponent.js';

/**
 * Service contract for the ordered draft components of each page.
 */
export interface IComponentService {
    /**
     * @throws NotFoundError if the page does not exist
     */
    create(pageId: string, input: IComponentCreateInput): Promise<IComponent>;

    /**
     * @throws NotFoundError if the component does not exist
     */
    get(componentId: string): IComponent;

    update(componentId: string, input: IComponentUpdateInput): Promise<IComponent>;

    delete(componentId: string): Promise<void>;

    /**
     * Draft components of a page in position order.
     *
     * @throws NotFoundError if the page does not exist
     */
    list(pageId: string): IComponent[];

    /**
     * Move a component to a new index within its draft (clamped).
     */
    move(componentId: string, position: number): Promise<IComponent>;

    /**
     * @throws InvalidOperationError if both IDs are equal or belong to different pages
     */
    moveBefore(componentId: string, beforeComponentId: string): Promise<IComponent>;

    /**
     * @throws InvalidOperationError if both IDs are equal or belong to different pages
     */
    moveAfter(componentId: string, afterComponentId: string): Promise<IComponent>;
}
