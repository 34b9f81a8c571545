import { expect } from "chai";
import { describe, it } from "node:test";
import { msUntilNextRun, scheduleDaily } from "./schedule";

describe("msUntilNextRun", () => {
  const nineThirty = new Date(2024, 0, 15, 9, 30);

  it("waits until later today", () => {
    expect(msUntilNextRun("10:00", nineThirty)).to.equal(30 * 60 * 1000);
  });

  it("rolls to tomorrow when the time is now", () => {
    expect(msUntilNextRun("10:00", new Date(2024, 0, 15, 10, 0))).to.equal(24 * 60 * 60 * 1000);
  });

  it("rolls to tomorrow when the time has passed", () => {
    expect(msUntilNextRun("10:00", new Date(2024, 0, 15, 10, 30))).to.equal(23.5 * 60 * 60 * 1000);
  });

  it("accepts a single-digit hour", () => {
    expect(msUntilNextRun("9:45", nineThirty)).to.equal(15 * 60 * 1000);
  });

  it("rejects malformed times", () => {
    expect(() => msUntilNextRun("24:00", nineThirty)).to.throw('Invalid time "24:00"');
    expect(() => msUntilNextRun("10:60", nineThirty)).to.throw('Invalid time "10:60"');
    expect(() => msUntilNextRun("ten", nineThirty)).to.throw('Invalid time "ten"');
  });
});

describe("scheduleDaily", () => {
  it("arms the next run and disarms on stop", () => {
    let runs = 0;
    const job = scheduleDaily("10:00", async () => {
      runs++;
    });

    const next = job.nextRunAt();
    expect(next).to.be.instanceOf(Date);
    expect(next === null ? 0 : next.getTime()).to.be.greaterThan(Date.now());

    job.stop();
    expect(job.nextRunAt()).to.equal(null);
    expect(runs).to.equal(0);
  });

  it("rejects a bad time before arming anything", () => {
    expect(() => scheduleDaily("25:00", async () => undefined)).to.throw('Invalid time "25:00"');
  });
});
