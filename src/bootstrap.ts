import { InjectorService } from "@tsed/di";
import { $log } from "@tsed/logger";
import type { EtlConfig } from "./config";

// registers the EnrichmentLookup provider; nothing else imports it directly
import "./services/OmdbService";

export async function createInjector(config: EtlConfig): Promise<InjectorService> {
  $log.level = config.logLevel;

  const injector = new InjectorService();
  injector.settings.set("etl", config);
  await injector.load();

  return injector;
}

export function resolve<T>(injector: InjectorService, token: new (...args: never[]) => T): T {
  const instance = injector.get<T>(token);
  if (!instance) {
    throw new Error(`${token.name} is not registered with the injector`);
  }
  return instance;
}
