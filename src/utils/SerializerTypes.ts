/**
 * Serializer configuration types
 * 序列化器配置类型
 */

import type { Logger } from './Logger';
import type { TypeBaker } from '../bake/TypeBaker';

/**
 * Serializer options
 * 序列化器选项
 */
export interface SerializerOptions {
  /** Maximum nesting depth of one conversion; guards against cyclic graphs 单次转换最大嵌套深度 */
  maxDepth?: number;
  /** Emit debug logs for bakes, compilations and runs 输出调试日志 */
  debug?: boolean;
  /** Logger to use; `null` creates a console logger 日志器；null时使用控制台日志器 */
  logger?: Logger | null;
  /** Baker to share; `null` uses the process-wide baker 共享的烘焙器；null时使用进程级烘焙器 */
  baker?: TypeBaker | null;
}

/**
 * Default serializer options
 * 默认序列化器选项
 */
export const DEFAULT_SERIALIZER_OPTIONS: Required<SerializerOptions> = {
  maxDepth: 4096,
  debug: false,
  logger: null,
  baker: null
};
