import { everyMinutes } from "../src/cron";

describe("everyMinutes", () => {
  it.each([
    [15, "*/15 * * * *"],
    [1, "*/1 * * * *"],
    [0, "*/1 * * * *"],
    [60, "0 * * * *"],
    [90, "0 * * * *"],
  ])("schedules %d minutes as %s", (minutes, expression) => {
    expect(everyMinutes(minutes)).toBe(expression);
  });
});
