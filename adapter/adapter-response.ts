/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import type { Binary } from './adapter-base'
import type { Attribute, CosmosMsg, Event } from './adapter-std'

/** When the dispatcher should call back into the emitting contract's `reply`. */
export type ReplyOn = 'always'|'error'|'success'|'never'

/** A message to dispatch after the contract returns, with its reply policy. */
export class SubMsg<C> {

  constructor (
    readonly msg:       CosmosMsg<C>,
    /** Correlation ID passed back in the reply. */
    readonly id:        number        = 0,
    readonly reply_on:  ReplyOn       = 'never',
    readonly gas_limit: number|null   = null,
    readonly payload?:  Binary,
  ) {}

  /** Fire and forget. */
  static new <C> (msg: CosmosMsg<C>): SubMsg<C> {
    return new SubMsg(msg)
  }

  static replyOnSuccess <C> (msg: CosmosMsg<C>, id: number): SubMsg<C> {
    return new SubMsg(msg, id, 'success')
  }

  static replyOnError <C> (msg: CosmosMsg<C>, id: number): SubMsg<C> {
    return new SubMsg(msg, id, 'error')
  }

  static replyAlways <C> (msg: CosmosMsg<C>, id: number): SubMsg<C> {
    return new SubMsg(msg, id, 'always')
  }

  withGasLimit (gasLimit: number): SubMsg<C> {
    return new SubMsg(this.msg, this.id, this.reply_on, gasLimit, this.payload)
  }

  withPayload (payload: Binary): SubMsg<C> {
    return new SubMsg(this.msg, this.id, this.reply_on, this.gas_limit, payload)
  }

}

/** Side effects of a successful state-changing contract call.
  * `C` is the chain-specific message extension. */
export class Response<C> {
  /** Sub-messages to dispatch, in order. */
  messages:   SubMsg<C>[]  = []
  attributes: Attribute[]  = []
  events:     Event[]      = []
  data:       Binary|null  = null

  addMessage (msg: CosmosMsg<C>): this {
    this.messages.push(SubMsg.new(msg))
    return this
  }

  addMessages (msgs: Iterable<CosmosMsg<C>>): this {
    for (const msg of msgs) this.addMessage(msg)
    return this
  }

  addSubmessage (msg: SubMsg<C>): this {
    this.messages.push(msg)
    return this
  }

  addSubmessages (msgs: Iterable<SubMsg<C>>): this {
    for (const msg of msgs) this.addSubmessage(msg)
    return this
  }

  addAttribute (key: string, value: string): this {
    this.attributes.push({ key, value })
    return this
  }

  addAttributes (attributes: Iterable<Attribute>): this {
    for (const { key, value } of attributes) this.addAttribute(key, value)
    return this
  }

  addEvent (event: Event): this {
    this.events.push(event)
    return this
  }

  addEvents (events: Iterable<Event>): this {
    for (const event of events) this.addEvent(event)
    return this
  }

  setData (data: Binary): this {
    this.data = data
    return this
  }
}
