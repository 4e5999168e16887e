import { Container, type interfaces } from 'inversify';

export class DependencyContainer {
  private readonly container = new Container({ defaultScope: 'Singleton' });

  public add<T>(id: symbol, implementation: interfaces.Newable<T>): void {
    this.container.bind<T>(id).to(implementation);
  }

  public addDynamic<T>(id: symbol, factory: () => T): void {
    this.container.bind<T>(id).toDynamicValue(factory);
  }

  public addValue<T>(id: symbol, value: T): void {
    this.container.bind<T>(id).toConstantValue(value);
  }

  public get<T>(id: symbol): T {
    return this.container.get<T>(id);
  }
}
