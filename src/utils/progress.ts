import { format } from "bytes";
import ms from "ms";

const activityIndicators = "⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏";

export class Progress {
  private bytes = 0;
  private readonly total: number;
  private readonly start: number = Date.now();

  private activityIndicatorIndex = 0;

  constructor(total: number) {
    this.total = total;
  }

  terminate(): void {
    process.stderr.write("\n");
  }

  complete(bytes: number): void {
    this.bytes = bytes;
    this.activityIndicatorIndex =
      (this.activityIndicatorIndex + 1) % activityIndicators.length;
    this.update();
  }

  update(): void {
    const { bytes, start, total } = this;
    const timeString = ms(Date.now() - start);
    const proportionComplete = total === 0 ? 1 : bytes / total;
    const percentCompleteString = `${(proportionComplete * 100).toFixed(2)}%`;
    const sizeString = `${format(bytes)} / ${format(total)}`;

    if (process.stderr.isTTY) {
      process.stderr.cursorTo(0);
      process.stderr.clearLine(1);
    } else {
      process.stderr.write("\r"); // carriage return
    }

    const message = `${percentCompleteString} ${sizeString} ${timeString}`;
    process.stderr.write(
      `${activityIndicators[this.activityIndicatorIndex]} ${message}`
    );
  }
}
