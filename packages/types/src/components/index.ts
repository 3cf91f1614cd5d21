export type { ComponentType, IComponent, IComponentCreateInput, IComponentUpdateInput } from './IComponent.js';
export type { IComponentService } from './IComponentService.js';
