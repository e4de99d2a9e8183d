import { t } from "../types/descriptor.js";
import type { ApiArgOptions, ApiMethodOptions, ApiServiceMeta } from "./registry.js";
import { declareMethod, registerArg, registerMethod, registerService } from "./registry.js";

export const Rpc = {
  /** Declares a method as exposed, with its results. */
  method(opts: ApiMethodOptions = {}) {
    return (
      target: object,
      methodName: string | symbol,
      // eslint-disable-next-line @typescript-eslint/no-unused-vars
      descriptor: PropertyDescriptor
    ) => {
      registerMethod({ target, methodName, options: opts });
    };
  },

  arg(opts: ApiArgOptions) {
    return (target: object, methodName: string | symbol | undefined, parameterIndex: number) => {
      if (methodName === undefined) throw new Error("@Rpc.arg is only supported on method parameters");
      registerArg({
        target,
        methodName,
        meta: { ...opts, parameterIndex }
      });
    };
  },

  /** Marks the ambient-context parameter. Only honoured in first position. */
  context() {
    return (target: object, methodName: string | symbol | undefined, parameterIndex: number) => {
      if (methodName === undefined) throw new Error("@Rpc.context is only supported on method parameters");
      registerArg({
        target,
        methodName,
        meta: { name: "ctx", type: t.context(), parameterIndex }
      });
    };
  },

  /** Optional class-level metadata used by code generation. */
  service(meta: ApiServiceMeta) {
    return (target: object) => {
      registerService(target, meta);
    };
  },

  declare: declareMethod
};
