import { asClass, asFunction, createContainer, InjectionMode, Lifetime } from "awilix";

import Config, { ConfigOptions } from "./Config";
import Rest from "./Rest";
import Deconz from "./Deconz";

export interface IServicesCradle {
  config: Config;
  rest: Rest;
  deconz: Deconz;
}

/**
 * One container per run; `options` reach only Config.
 */
export function createCradle(options: ConfigOptions = {}): IServicesCradle {
  const container = createContainer<IServicesCradle>({
    injectionMode: InjectionMode.PROXY,
  });

  container.register({
    config: asFunction(() => new Config(options), { lifetime: Lifetime.SINGLETON }),
    rest: asClass(Rest, { lifetime: Lifetime.SINGLETON }),
    deconz: asClass(Deconz, { lifetime: Lifetime.SINGLETON }),
  });

  return container.cradle;
}
