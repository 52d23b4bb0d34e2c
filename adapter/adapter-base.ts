/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { Error as BaseError } from '@hackbg/oops'
import { Console as BaseConsole, bold, colors } from '@hackbg/logs'
import config from './adapter-config'

export { bold, colors }

/** An address on a chain. */
export type Address = string

/** A 128-bit integer. */
export type Uint128 = string

/** Base64-encoded binary data, as it appears in the contract JSON ABI. */
export type Binary = string

/** The name of a contract entry point. */
export type EntryPoint = 'execute'|'instantiate'|'query'|'sudo'|'reply'|'migrate'

/** Placeholder for chains with no custom message or query extension. Serializes as `{}`. */
export type Empty = Record<string, never>

/** Outcome of a contract operation, in the shape used by the contract JSON ABI. */
export type ContractResult<T, E> = { Ok: T } | { Err: E }

/** Result of any operation of the uniform contract interface. */
export type AnyResult<T> = ContractResult<T, AnyError>

export const ok = <T> (value: T): { Ok: T } => ({ Ok: value })

export const err = <E> (error: E): { Err: E } => ({ Err: error })

export const isOk = <T, E> (result: ContractResult<T, E>): result is { Ok: T } =>
  'Ok' in result

export const isErr = <T, E> (result: ContractResult<T, E>): result is { Err: E } =>
  'Err' in result

/** Return the `Ok` value or throw the `Err` value. */
export function unwrap <T, E> (result: ContractResult<T, E>): T {
  if (isOk(result)) return result.Ok
  throw result.Err
}

/** Display text of an arbitrary error value. */
export function displayError (error: unknown): string {
  if (error instanceof globalThis.Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}

/** Error kinds. */
export class AdapterError extends BaseError {

  /** The message could not be decoded into the type the entry point expects. */
  static MessageFormat = this.define('MessageFormat',
    (operation: EntryPoint, diagnostic: string) =>
      `Error parsing ${operation} message: ${diagnostic}`)

  /** An optional entry point was never populated. */
  static NotImplemented = this.define('NotImplemented',
    (operation: EntryPoint) => `${operation} is not implemented for contract`)

  /** The wrapped entry point itself failed. Message is the display text of its error. */
  static Callback = this.define('Callback',
    (operation: EntryPoint, message: string) => message)

  /** A query made through the querier failed. */
  static Query = this.define('Query',
    (diagnostic: string) => `Querier error: ${diagnostic}`)

  /** An address could not be validated by the API. */
  static InvalidAddress = this.define('InvalidAddress',
    (address: string, reason: string) => `Invalid address ${address}: ${reason}`)

  /** Storage does not accept empty values. */
  static EmptyValue = this.define('EmptyValue',
    () => 'TL;DR: Value must not be empty in Storage::set but in most cases you can use Storage::remove instead.')

  /** A custom message came out of a baseline entry point. Fatal. */
  static Unreachable = this.define('Unreachable',
    () => 'internal error: entered unreachable code: custom message in baseline response')

  /** A sub-message was not any known variant of CosmosMsg. Fatal. */
  static UnknownVariant = this.define('UnknownVariant',
    (msg: string) => `unknown message variant ${msg}`)

}

/** Uniform error type of the contract interface. */
export type AnyError = AdapterError

/** Whether an error is an invariant violation that must not be handled as a contract failure. */
export const isFatal = (error: unknown): boolean =>
  error instanceof AdapterError.Unreachable || error instanceof AdapterError.UnknownVariant

/** Console whose `debug` and `trace` output is shown only when `config.debug` is set.
  * Gated per instance: the base class defines its log methods as instance fields. */
export class AdapterConsole extends BaseConsole {
  constructor (label: string = 'ContractWrapper') {
    super(label)
    this.label = label
    const debug = this.debug.bind(this)
    const trace = this.trace.bind(this)
    this.debug = (...args: Parameters<typeof debug>) => {
      if (config.debug) debug(...args)
      return this
    }
    this.trace = (...args: Parameters<typeof trace>) => {
      if (config.debug) trace(...args)
      return this
    }
  }
}
