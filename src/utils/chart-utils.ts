export interface AsciiBar {
  label: string;
  value: number;
}

export class ChartUtils {
  /**
   * Renders labelled values as a horizontal ASCII bar chart, scaled between
   * the smallest and largest value so close prices still read apart.
   * @param width Max bar length in characters (default: 40)
   * @returns string representation of the chart
   */
  public static generateBarChart(bars: AsciiBar[], width: number = 40): string {
    if (!bars || bars.length === 0) return "";

    const values = bars.map(b => b.value);
    const min = Math.min(...values);
    const max = Math.max(...values);
    const range = max - min;

    const labelWidth = Math.max(...bars.map(b => b.label.length));
    const valueWidth = Math.max(...values.map(v => v.toFixed(2).length));

    return bars
      .map(bar => {
        // The smallest value still gets one cell so every row shows a bar
        const length =
          range === 0
            ? width
            : 1 + Math.round(((bar.value - min) / range) * (width - 1));
        const label = bar.label.padEnd(labelWidth, " ");
        const value = bar.value.toFixed(2).padStart(valueWidth, " ");
        return `${label} | ${value} ${"#".repeat(length)}`;
      })
      .join("\n");
  }
}
