//https://github.com/microsoft/TypeScript/issues/57226
//IMPORTANT: put this in a higher priority folder than the actual module to override it.
//Only the parts of axe this package calls are declared here.
declare module "axe" {
  export type AxeLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

  export type LevelMethods = Record<
    AxeLevel,
    (message: unknown, meta?: Record<string, unknown>) => Promise<void>
  >;

  export interface AxeInstance extends LevelMethods {
    log(...args: unknown[]): Promise<void>;
    setLevel(level: string): void;
    setName(name: string): void;
    config: {
      version: string;
      levels: string[];
      level: string;
    };
  }

  namespace Axe {
    /**
     * Any object with at least an `info` or `log` method can back axe
     * (console, pino, a test double).
     */
    interface Logger {
      info?: (...args: unknown[]) => unknown;
      log?: (...args: unknown[]) => unknown;
    }

    interface Options {
      showStack?: boolean;
      /** Invoke no logger methods at all. Hooks still run. @default false */
      silent?: boolean;
      /** Backing logger. @default console */
      logger?: Logger;
      name?: string | boolean;
      /** Minimum level to emit. @default 'info' */
      level?: string;
      /** Levels that may be invoked at all. @default ['info','warn','error','fatal'] */
      levels?: string[];
      /** Parse application info (git, package.json) into meta. @default true */
      appInfo?: boolean;
    }
  }

  const Axe: new (config?: Axe.Options) => AxeInstance;

  export default Axe;
}
