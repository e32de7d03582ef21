import Debug from "debug";
import ms from "ms";

Debug.formatArgs = function formatArgs(
  this: Debug.Debugger,
  args: unknown[]
): void {
  const [message] = args;
  const prefix = `${new Date().toISOString()} ${this.namespace} `;

  args[0] = prefix + String(message).split("\n").join("\n" + prefix);
  args.push(`+${ms(this.diff)}`);
};
export default Debug;
