/**
 * @module wirebox/infrastructure/di
 * @description Resolution engine implementation
 */

export { Container } from './Container';
export { BindingRegistry } from './BindingRegistry';
export { ConstructorIntrospector } from './ConstructorIntrospector';
export { InstanceProvider, AliasProvider } from './providers';
