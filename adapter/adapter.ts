/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
export * from './adapter-base'
export * from './adapter-config'
export * from './adapter-json'
export * from './adapter-std'
export * from './adapter-response'
export * from './adapter-deps'
export * from './adapter-contract'
export * from './adapter-customize'
export * from './adapter-wrapper'
export * from './adapter-mock'
export { default as config } from './adapter-config'
