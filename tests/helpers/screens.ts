import { defineHub } from "../../src/hubs/categories";
import { NormalScreen } from "../../src/screens/normal-screen";
import { PersonalizationScreen } from "../../src/screens/personalization-screen";
import { StandaloneScreen } from "../../src/screens/standalone-screen";
import type { CancellationToken } from "../../src/workers/worker-registry";
import type { TestContext } from "./fixtures";

export const HubA = defineHub("HubA", "Hub A");
export const HubB = defineHub("HubB");

/** Overrides nothing beyond what the bases require. */
export class MinimalScreen extends NormalScreen<TestContext> {
  public override apply(): void {
    this.data.events.push("apply:MinimalScreen");
  }

  public override get status(): string {
    return "minimal";
  }
}

export class TimezoneScreen extends NormalScreen<TestContext> {
  public static readonly category = HubA;
  public static readonly title = "Time Zone";
  public static readonly icon = "clock";

  public selection = "UTC";
  public checked = false;

  public override apply(): void {
    this.data.timezone = this.selection;
  }

  public override get completed(): boolean {
    return this.checked;
  }

  public override get status(): string {
    return this.data.timezone ?? "Not set";
  }

  public override async check(token: CancellationToken): Promise<void> {
    this.checked = false;
    await Promise.resolve();
    if (token.cancelled) return;
    this.checked = this.selection.length > 0;
  }
}

export class NetworkScreen extends NormalScreen<TestContext> {
  public static readonly category = HubB;
  public static readonly title = "Network";

  public override apply(): void {
    this.data.hostname = this.installClass.defaultHostname;
  }

  public override get status(): string {
    return this.data.hostname ?? "Not connected";
  }
}

export class UncategorizedScreen extends NormalScreen<TestContext> {
  public static readonly title = "Hidden";

  public override apply(): void {}

  public override get status(): string {
    return "";
  }
}

export class RootPasswordScreen extends PersonalizationScreen<TestContext> {
  public static readonly category = HubA;
  public static readonly title = "Root Password";

  public override apply(): void {
    this.data.events.push("apply:RootPasswordScreen");
  }

  public override get completed(): boolean {
    return true;
  }

  public override get status(): string {
    return "Password set";
  }
}

export class WelcomeScreen extends StandaloneScreen<TestContext> {
  public static readonly preForHub = HubA;
  public static readonly priority = 0;

  public override apply(): void {
    this.data.events.push("apply:WelcomeScreen");
  }

  public override get status(): string {
    return "Welcome";
  }
}
