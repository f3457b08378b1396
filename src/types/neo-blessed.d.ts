// neo-blessed ships no typings; its API is blessed's.
declare module "neo-blessed" {
  import * as blessed from "blessed";
  export default blessed;
}
