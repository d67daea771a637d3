import { describe, expect, test } from "vitest";

import { HeadlessWindow } from "../../src/ui/headless";
import { AbstractInstantiationError, NotImplementedError } from "../../src/screens/errors";
import { NormalScreen } from "../../src/screens/normal-screen";
import { PersonalizationScreen } from "../../src/screens/personalization-screen";
import { Screen } from "../../src/screens/screen";
import { StandaloneScreen } from "../../src/screens/standalone-screen";
import { createContext, createRuntime, type TestContext } from "../helpers/fixtures";
import { HubA, MinimalScreen, RootPasswordScreen, TimezoneScreen, WelcomeScreen } from "../helpers/screens";

class ApplyOnlyScreen extends NormalScreen<TestContext> {
  public override apply(): void {}
}

class BareNormalScreen extends NormalScreen<TestContext> {}

describe("abstract screen bases", () => {
  const bases = [
    ["Screen", Screen],
    ["StandaloneScreen", StandaloneScreen],
    ["NormalScreen", NormalScreen],
    ["PersonalizationScreen", PersonalizationScreen],
  ] as const;

  for (const [name, base] of bases) {
    test(`${name} cannot be constructed directly`, () => {
      expect(() => Reflect.construct(base, [createContext(), createRuntime()])).toThrow(AbstractInstantiationError);
    });

    test(`${name} names itself in the error`, () => {
      expect(() => Reflect.construct(base, [createContext(), createRuntime()])).toThrow(`${name} is an abstract class`);
    });
  }

  test("concrete subclasses of every base construct", () => {
    const runtime = createRuntime();
    const context = createContext();

    expect(new MinimalScreen(context, runtime).kind).toBe("normal");
    expect(new WelcomeScreen(context, runtime).kind).toBe("standalone");
    expect(new RootPasswordScreen(context, runtime).kind).toBe("personalization");
  });
});

describe("screen construction", () => {
  test("keeps the shared handles by reference", () => {
    const context = createContext();
    const screen = new TimezoneScreen(context, createRuntime());

    expect(screen.data).toBe(context.data);
    expect(screen.storage).toBe(context.storage);
    expect(screen.payload).toBe(context.payload);
    expect(screen.installClass).toBe(context.installClass);
  });

  test("copies static display metadata onto the instance", () => {
    const screen = new TimezoneScreen(createContext(), createRuntime());

    expect(screen.screenName).toBe("TimezoneScreen");
    expect(screen.category).toBe(HubA);
    expect(screen.title).toBe("Time Zone");
    expect(screen.icon).toBe("clock");
  });

  test("leaves metadata unset when the class declares none", () => {
    const screen = new MinimalScreen(createContext(), createRuntime());

    expect(screen.category).toBeUndefined();
    expect(screen.title).toBeUndefined();
    expect(screen.icon).toBeUndefined();
  });

  test("gets its window from the runtime factory", () => {
    const runtime = createRuntime();
    const screen = new TimezoneScreen(createContext(), runtime);

    expect(screen.window).toBe(runtime.windows.get("TimezoneScreen"));
  });

  test("falls back to a headless window", () => {
    const runtime = createRuntime();
    const screen = new TimezoneScreen(createContext(), { workers: runtime.workers, loop: runtime.loop });

    expect(screen.window).toBeInstanceOf(HeadlessWindow);
    expect(screen.window.visible).toBe(false);
  });
});

describe("screen defaults", () => {
  test("a minimal normal screen is not completed but is ready", () => {
    const screen = new MinimalScreen(createContext(), createRuntime());

    expect(screen.completed).toBe(false);
    expect(screen.ready).toBe(true);
    expect(screen.selector).toBeNull();
    expect(screen.checkState).toBe("idle");
  });

  test("status without an override is a programming error", () => {
    const screen = new ApplyOnlyScreen(createContext(), createRuntime());

    expect(() => screen.status).toThrow(NotImplementedError);
    expect(() => screen.status).toThrow("ApplyOnlyScreen does not implement status");
  });

  test("apply without an override is a programming error", () => {
    const screen = new BareNormalScreen(createContext(), createRuntime());

    expect(() => screen.apply()).toThrow(NotImplementedError);
    expect(() => screen.apply()).toThrow("BareNormalScreen does not implement apply()");
  });

  test("apply writes into the shared data object", () => {
    const context = createContext();
    const screen = new TimezoneScreen(context, createRuntime());
    screen.selection = "Europe/Prague";

    screen.apply();

    expect(context.data.timezone).toBe("Europe/Prague");
    expect(screen.status).toBe("Europe/Prague");
  });
});
