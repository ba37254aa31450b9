// BOOTSTRAP - Dependency Injection Container
// The only place that knows about concrete implementations

import fs from 'fs';

import { TaskFormController } from '../boundary/http/task-form.controller';
import { TaskFormCheckpoint } from '../core-abstractions/checkpoints/task-form.checkpoint';
import { InstantPolicy, LocalTimeInstantPolicy } from '../core-abstractions/policies/instant.policy';
import { ITaskTrackerGateway } from '../core-abstractions/ports/task-tracker.gateway';
import { HttpTaskTrackerGateway } from '../implementations/gateways/task-tracker.http.gateway';
import { InMemoryTaskTrackerGateway } from '../implementations/gateways/task-tracker.in-memory.gateway';
import { AddTaskOperator } from '../operators/add-task.operator';
import { AppConfig, AppEnvironment, addTaskUrl } from './config';

export interface AppServices {
  InstantPolicy: InstantPolicy;
  ITaskTrackerGateway: ITaskTrackerGateway;
  TaskFormCheckpoint: TaskFormCheckpoint;
  AddTaskOperator: AddTaskOperator;
  TaskFormController: TaskFormController;
}

interface Registration<T> {
  factory: () => T;
  singleton: boolean;
}

export class DIContainer<S> {
  private registry: { [K in keyof S]?: Registration<S[K]> } = {};
  private singletons: { [K in keyof S]?: S[K] } = {};

  register<K extends keyof S>(token: K, factory: () => S[K], singleton: boolean = true): void {
    this.registry[token] = { factory, singleton };
    delete this.singletons[token];
  }

  resolve<K extends keyof S>(token: K): S[K] {
    const registration = this.registry[token];
    if (!registration) {
      throw new Error(`Service not registered: ${String(token)}`);
    }

    if (!registration.singleton) {
      return registration.factory();
    }

    const existing = this.singletons[token];
    if (existing !== undefined) {
      return existing;
    }
    const instance = registration.factory();
    this.singletons[token] = instance;
    return instance;
  }

  clear(): void {
    this.registry = {};
    this.singletons = {};
  }
}

export class ContainerConfig {
  // Everything except the gateway is the same in every environment
  private static configureCore(container: DIContainer<AppServices>, config: AppConfig): void {
    container.register('InstantPolicy', () => new LocalTimeInstantPolicy());
    container.register('TaskFormCheckpoint', () => new TaskFormCheckpoint());

    container.register('AddTaskOperator', () => new AddTaskOperator(
      container.resolve('TaskFormCheckpoint'),
      container.resolve('InstantPolicy'),
      container.resolve('ITaskTrackerGateway')
    ));

    container.register('TaskFormController', () => new TaskFormController(
      container.resolve('AddTaskOperator'),
      fs.readFileSync(config.formPagePath, 'utf8')
    ));
  }

  static configureForProduction(container: DIContainer<AppServices>, config: AppConfig): void {
    container.register('ITaskTrackerGateway', () => new HttpTaskTrackerGateway({
      addTaskUrl: addTaskUrl(config)
    }));
    ContainerConfig.configureCore(container, config);
  }

  // Tasks are kept in memory so the form can be tried without the API running
  static configureForDevelopment(container: DIContainer<AppServices>, config: AppConfig): void {
    container.register('ITaskTrackerGateway', () => new InMemoryTaskTrackerGateway());
    ContainerConfig.configureCore(container, config);
  }

  static configureForTesting(container: DIContainer<AppServices>, config: AppConfig): void {
    container.register('ITaskTrackerGateway', () => new InMemoryTaskTrackerGateway());
    ContainerConfig.configureCore(container, config);
  }
}

export class ContainerFactory {
  static create(config: AppConfig, environment: AppEnvironment = config.environment): DIContainer<AppServices> {
    const container = new DIContainer<AppServices>();

    switch (environment) {
      case 'development':
        ContainerConfig.configureForDevelopment(container, config);
        break;
      case 'production':
        ContainerConfig.configureForProduction(container, config);
        break;
      case 'testing':
        ContainerConfig.configureForTesting(container, config);
        break;
    }

    return container;
  }
}
