/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import type { Address, Binary, Uint128 } from './adapter-base'

/** Some amount of a native token. */
export interface Coin {
  denom:  string
  amount: Uint128
}

export interface BlockInfo {
  height:   number
  /** Nanoseconds since the Unix epoch, as a decimal string. */
  time:     string
  chain_id: string
}

/** Environment of a contract call. */
export interface Env {
  block:        BlockInfo
  transaction?: { index: number }
  contract:     { address: Address }
}

/** Sender and attached funds of a call to `execute` or `instantiate`. */
export interface MessageInfo {
  sender: Address
  funds:  Coin[]
}

export interface Attribute {
  key:   string
  value: string
}

export interface Event {
  type:       string
  attributes: Attribute[]
}

export type WasmMsg =
  | { execute:     { contract_addr: Address, msg: Binary, funds: Coin[] } }
  | { instantiate: { admin: Address|null, code_id: number, msg: Binary, funds: Coin[], label: string } }
  | { migrate:     { contract_addr: Address, new_code_id: number, msg: Binary } }
  | { update_admin: { contract_addr: Address, admin: Address } }
  | { clear_admin: { contract_addr: Address } }

export type BankMsg =
  | { send: { to_address: Address, amount: Coin[] } }
  | { burn: { amount: Coin[] } }

export type StakingMsg =
  | { delegate:   { validator: string, amount: Coin } }
  | { undelegate: { validator: string, amount: Coin } }
  | { redelegate: { src_validator: string, dst_validator: string, amount: Coin } }

export type DistributionMsg =
  | { set_withdraw_address: { address: Address } }
  | { withdraw_delegator_reward: { validator: string } }
  | { fund_community_pool: { amount: Coin[] } }

export type IbcMsg =
  | { transfer: { channel_id: string, to_address: string, amount: Coin, timeout: unknown, memo?: string } }
  | { send_packet: { channel_id: string, data: Binary, timeout: unknown } }
  | { close_channel: { channel_id: string } }

/** A message that a contract emits to be dispatched after it returns.
  * `C` is the chain-specific extension carried by the `custom` variant. */
export type CosmosMsg<C> =
  | { wasm:         WasmMsg }
  | { bank:         BankMsg }
  | { staking:      StakingMsg }
  | { distribution: DistributionMsg }
  | { ibc:          IbcMsg }
  | { stargate:     { type_url: string, value: Binary } }
  | { custom:       C }

export type WasmQuery =
  | { smart:         { contract_addr: Address, msg: Binary } }
  | { raw:           { contract_addr: Address, key: Binary } }
  | { contract_info: { contract_addr: Address } }

export type BankQuery =
  | { balance:      { address: Address, denom: string } }
  | { all_balances: { address: Address } }

export type StakingQuery =
  | { bonded_denom: {} }
  | { all_validators: {} }
  | { validator: { address: string } }

/** A query that a contract makes through its querier.
  * `Q` is the chain-specific extension carried by the `custom` variant. */
export type QueryRequest<Q> =
  | { bank:     BankQuery }
  | { staking:  StakingQuery }
  | { wasm:     WasmQuery }
  | { ibc:      unknown }
  | { stargate: { path: string, data: Binary } }
  | { custom:   Q }

/** Failure of the querier itself, as opposed to a failure of the queried contract. */
export type SystemError =
  | { invalid_request:  { error: string, request: Binary } }
  | { invalid_response: { error: string, response: Binary } }
  | { no_such_contract: { addr: Address } }
  | { unsupported_request: { kind: string } }
  | { unknown: {} }

/** Response of the raw querier: outer layer for the system, inner for the contract. */
export type SystemResult = { Ok: { Ok: Binary } | { Err: string } } | { Err: SystemError }

export interface MsgResponse {
  type_url: string
  value:    Binary
}

export interface SubMsgResponse {
  events:         Event[]
  data?:          Binary|null
  msg_responses?: MsgResponse[]
}

export type SubMsgResult = { ok: SubMsgResponse } | { error: string }

/** Outcome of a dispatched sub-message, delivered back through `reply`. */
export interface Reply {
  /** Correlation ID of the sub-message. */
  id:        number
  payload?:  Binary
  gas_used?: number
  result:    SubMsgResult
}
