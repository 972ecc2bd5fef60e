import { describe, it, expect } from "vitest";
import { averageBearing, bearing, greatCircleDistance, metersToNauticalMiles } from "./geo.js";

describe("greatCircleDistance", () => {
  it("is zero for identical coordinates", () => {
    expect(greatCircleDistance({ lon: 10, lat: 54 }, { lon: 10, lat: 54 })).toBe(0);
  });

  it("spans one degree of arc along the equator", () => {
    expect(greatCircleDistance({ lon: 0, lat: 0 }, { lon: 1, lat: 0 })).toBeCloseTo(111194.682, 2);
  });

  it("is symmetric", () => {
    const a = { lon: 9.97, lat: 53.54 };
    const b = { lon: 8.75, lat: 53.87 };
    expect(greatCircleDistance(a, b)).toBeCloseTo(greatCircleDistance(b, a), 6);
  });
});

describe("bearing", () => {
  const origin = { lon: 0, lat: 0 };

  it("measures clockwise from north", () => {
    expect(bearing(origin, { lon: 0, lat: 1 })).toBe(0);
    expect(bearing(origin, { lon: 1, lat: 0 })).toBeCloseTo(90, 10);
    expect(bearing(origin, { lon: 0, lat: -1 })).toBeCloseTo(180, 10);
    expect(bearing(origin, { lon: -1, lat: 0 })).toBeCloseTo(270, 10);
  });

  it("stays in [0, 360)", () => {
    expect(bearing(origin, { lon: -1, lat: 1 })).toBeCloseTo(315, 10);
  });
});

describe("averageBearing", () => {
  it("averages nearby bearings", () => {
    expect(averageBearing(90, 180)).toBe(135);
  });

  it("takes the short way round through north", () => {
    expect(averageBearing(350, 10)).toBe(0);
    expect(averageBearing(10, 350)).toBe(0);
    expect(averageBearing(340, 20)).toBe(0);
    expect(averageBearing(300, 20)).toBe(340);
  });
});

describe("metersToNauticalMiles", () => {
  it("uses the international nautical mile", () => {
    expect(metersToNauticalMiles(3704)).toBe(2);
  });
});
