import type { ObjectId } from 'mongodb';
import type { ComponentType } from '@quire/types';

/**
 * MongoDB document for a draft component, stored in `page_components`.
 */
export interface IComponentDocument {
    _id: ObjectId;
    pageId: ObjectId;
    position: number;
    componentType: ComponentType;
    title: string | null;
    body: string;
    template: string;
    createdAt: Date;
    updatedAt: Date;
}
