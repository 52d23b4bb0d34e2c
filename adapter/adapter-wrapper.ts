/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import type { AnyError, AnyResult, Binary, ContractResult, Empty, EntryPoint } from './adapter-base'
import type { Contract, ContractFn, MessageSchema, PermissionedFn, QueryFn, ReplyFn } from './adapter-contract'
import type { Deps, DepsMut } from './adapter-deps'
import type { Env, MessageInfo, Reply } from './adapter-std'
import type { Response } from './adapter-response'
import { AdapterConsole, AdapterError, bold, displayError, err, isFatal, ok } from './adapter-base'
import {
  customizeContractFn, customizeQueryFn, customizePermissionedFn, customizeReplyFn
} from './adapter-customize'
import { fromJson } from './adapter-json'

const log = new AdapterConsole('ContractWrapper')

/** Optional validators of each entry point's decoded message. */
export interface MessageSchemas<T1, T2, T3, T4, T6> {
  execute?:     MessageSchema<T1>
  instantiate?: MessageSchema<T2>
  query?:       MessageSchema<T3>
  sudo?:        MessageSchema<T4>
  migrate?:     MessageSchema<T6>
}

/** Presents a contract made of independently typed entry point functions
  * through the uniform {@link Contract} interface.
  *
  * Type parameters, in order: messages of `execute`, `instantiate`, `query`;
  * errors of `execute`, `instantiate`, `query`; custom message extension;
  * custom query extension; message and error of `sudo`; error of `reply`;
  * message and error of `migrate`.
  *
  * Instances are immutable. The `with*` methods return a new wrapper. */
export class ContractWrapper<
  T1, T2, T3, E1, E2, E3,
  C  = Empty,
  Q  = Empty,
  T4 = Empty,
  E4 = AnyError,
  E5 = AnyError,
  T6 = Empty,
  E6 = AnyError,
> implements Contract<C, Q> {

  protected constructor (
    readonly executeFn:     ContractFn<T1, C, E1, Q>,
    readonly instantiateFn: ContractFn<T2, C, E2, Q>,
    readonly queryFn:       QueryFn<T3, E3, Q>,
    readonly sudoFn:        PermissionedFn<T4, C, E4, Q>|null = null,
    readonly replyFn:       ReplyFn<C, E5, Q>|null            = null,
    readonly migrateFn:     PermissionedFn<T6, C, E6, Q>|null = null,
    readonly schemas:       Readonly<MessageSchemas<T1, T2, T3, T4, T6>> = {},
  ) {}

  /** Wrap the mandatory entry points as they are. */
  static new <T1, T2, T3, E1, E2, E3, C = Empty, Q = Empty> (
    executeFn:     ContractFn<T1, C, E1, Q>,
    instantiateFn: ContractFn<T2, C, E2, Q>,
    queryFn:       QueryFn<T3, E3, Q>,
  ): ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q> {
    return new ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q>(executeFn, instantiateFn, queryFn)
  }

  /** Wrap mandatory entry points that were written against the baseline environment,
    * for use by a caller with custom message extension `C` and query extension `Q`. */
  static newWithEmpty <T1, T2, T3, E1, E2, E3, C = Empty, Q = Empty> (
    executeFn:     ContractFn<T1, Empty, E1, Empty>,
    instantiateFn: ContractFn<T2, Empty, E2, Empty>,
    queryFn:       QueryFn<T3, E3, Empty>,
  ): ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q> {
    return new ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q>(
      customizeContractFn<T1, C, E1, Q>(executeFn),
      customizeContractFn<T2, C, E2, Q>(instantiateFn),
      customizeQueryFn<T3, E3, Q>(queryFn),
    )
  }

  /** Populate the `sudo` entry point. */
  withSudo <T4A, E4A> (
    sudoFn: PermissionedFn<T4A, C, E4A, Q>
  ): ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q, T4A, E4A, E5, T6, E6> {
    return new ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q, T4A, E4A, E5, T6, E6>(
      this.executeFn, this.instantiateFn, this.queryFn,
      sudoFn, this.replyFn, this.migrateFn,
      { ...this.schemas, sudo: undefined }
    )
  }

  /** Populate the `sudo` entry point with one written against the baseline environment. */
  withSudoEmpty <T4A, E4A> (
    sudoFn: PermissionedFn<T4A, Empty, E4A, Empty>
  ): ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q, T4A, E4A, E5, T6, E6> {
    return this.withSudo(customizePermissionedFn<T4A, C, E4A, Q>(sudoFn))
  }

  /** Populate the `reply` entry point. */
  withReply <E5A> (
    replyFn: ReplyFn<C, E5A, Q>
  ): ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q, T4, E4, E5A, T6, E6> {
    return new ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q, T4, E4, E5A, T6, E6>(
      this.executeFn, this.instantiateFn, this.queryFn,
      this.sudoFn, replyFn, this.migrateFn,
      this.schemas
    )
  }

  /** Populate the `reply` entry point with one written against the baseline environment. */
  withReplyEmpty <E5A> (
    replyFn: ReplyFn<Empty, E5A, Empty>
  ): ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q, T4, E4, E5A, T6, E6> {
    return this.withReply(customizeReplyFn<C, E5A, Q>(replyFn))
  }

  /** Populate the `migrate` entry point. */
  withMigrate <T6A, E6A> (
    migrateFn: PermissionedFn<T6A, C, E6A, Q>
  ): ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q, T4, E4, E5, T6A, E6A> {
    return new ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q, T4, E4, E5, T6A, E6A>(
      this.executeFn, this.instantiateFn, this.queryFn,
      this.sudoFn, this.replyFn, migrateFn,
      { ...this.schemas, migrate: undefined }
    )
  }

  /** Populate the `migrate` entry point with one written against the baseline environment. */
  withMigrateEmpty <T6A, E6A> (
    migrateFn: PermissionedFn<T6A, Empty, E6A, Empty>
  ): ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q, T4, E4, E5, T6A, E6A> {
    return this.withMigrate(customizePermissionedFn<T6A, C, E6A, Q>(migrateFn))
  }

  /** Validate decoded messages of the given entry points.
    * Replacing an entry point later drops its schema. */
  withSchemas (
    schemas: MessageSchemas<T1, T2, T3, T4, T6>
  ): ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q, T4, E4, E5, T6, E6> {
    return new ContractWrapper<T1, T2, T3, E1, E2, E3, C, Q, T4, E4, E5, T6, E6>(
      this.executeFn, this.instantiateFn, this.queryFn,
      this.sudoFn, this.replyFn, this.migrateFn,
      { ...this.schemas, ...schemas }
    )
  }

  execute (deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: Uint8Array): AnyResult<Response<C>> {
    return dispatch('execute', msg, this.schemas.execute,
      (decoded: T1) => this.executeFn(deps, env, info, decoded))
  }

  instantiate (deps: DepsMut<Q>, env: Env, info: MessageInfo, msg: Uint8Array): AnyResult<Response<C>> {
    return dispatch('instantiate', msg, this.schemas.instantiate,
      (decoded: T2) => this.instantiateFn(deps, env, info, decoded))
  }

  query (deps: Deps<Q>, env: Env, msg: Uint8Array): AnyResult<Binary> {
    return dispatch('query', msg, this.schemas.query,
      (decoded: T3) => this.queryFn(deps, env, decoded))
  }

  /** Fails with {@link AdapterError.NotImplemented} when `sudo` was never populated. */
  sudo (deps: DepsMut<Q>, env: Env, msg: Uint8Array): AnyResult<Response<C>> {
    const sudoFn = this.sudoFn
    if (!sudoFn) return err(new AdapterError.NotImplemented('sudo'))
    return dispatch('sudo', msg, this.schemas.sudo,
      (decoded: T4) => sudoFn(deps, env, decoded))
  }

  /** Fails with {@link AdapterError.NotImplemented} when `reply` was never populated.
    * The reply is passed through without decoding. */
  reply (deps: DepsMut<Q>, env: Env, reply: Reply): AnyResult<Response<C>> {
    const replyFn = this.replyFn
    if (!replyFn) return err(new AdapterError.NotImplemented('reply'))
    log.debug(bold('reply'), 'id', reply.id)
    return invoke('reply', () => replyFn(deps, env, reply))
  }

  /** Fails with {@link AdapterError.NotImplemented} when `migrate` was never populated. */
  migrate (deps: DepsMut<Q>, env: Env, msg: Uint8Array): AnyResult<Response<C>> {
    const migrateFn = this.migrateFn
    if (!migrateFn) return err(new AdapterError.NotImplemented('migrate'))
    return dispatch('migrate', msg, this.schemas.migrate,
      (decoded: T6) => migrateFn(deps, env, decoded))
  }

}

/** Decode a message envelope into an entry point's message type. */
export function decodeMessage <T> (
  operation: EntryPoint,
  data:      Uint8Array,
  schema?:   MessageSchema<T>
): AnyResult<T> {
  try {
    const decoded = fromJson<T>(data)
    return ok(schema ? schema.parse(decoded) : decoded)
  } catch (e) {
    return err(Object.assign(
      new AdapterError.MessageFormat(operation, displayError(e)), { operation, cause: e }
    ))
  }
}

function dispatch <T, R, E> (
  operation: EntryPoint,
  data:      Uint8Array,
  schema:    MessageSchema<T>|undefined,
  callback:  (msg: T) => ContractResult<R, E>
): AnyResult<R> {
  log.debug(bold(operation), `${data.length} bytes`)
  const decoded = decodeMessage<T>(operation, data, schema)
  if ('Err' in decoded) {
    log.debug(bold(operation), 'rejected message:', decoded.Err.message)
    return decoded
  }
  return invoke(operation, () => callback(decoded.Ok))
}

/** Call an entry point and convert its error, returned or thrown, into the uniform error. */
function invoke <R, E> (
  operation: EntryPoint,
  callback:  () => ContractResult<R, E>
): AnyResult<R> {
  let result: ContractResult<R, E>
  try {
    result = callback()
  } catch (e) {
    if (isFatal(e)) throw e
    return err(callbackError(operation, e))
  }
  if ('Err' in result) return err(callbackError(operation, result.Err))
  return result
}

function callbackError (operation: EntryPoint, cause: unknown): AnyError {
  const message = displayError(cause)
  log.warn(bold(operation), 'failed:', message)
  return Object.assign(new AdapterError.Callback(operation, message), { operation, cause })
}
