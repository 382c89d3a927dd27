import { describe, it, expect } from "vitest";
import {
  buildConfirmationEmail,
  buildConfirmationLink,
  buildIssueEmail,
  CONFIRMATION_SUBJECT,
} from "../../../domain/payload-builders/index.js";
import { escapeHtml, interpolateVariables } from "../../../domain/utils/template.js";

describe("buildConfirmationLink", () => {
  it("should append the confirm path and the token", () => {
    expect(buildConfirmationLink("https://news.example.com", "abc.1.2.ff")).toBe(
      "https://news.example.com/subscriptions/confirm?token=abc.1.2.ff"
    );
  });

  it("should strip trailing slashes from the base URL", () => {
    expect(buildConfirmationLink("https://news.example.com//", "t")).toBe(
      "https://news.example.com/subscriptions/confirm?token=t"
    );
  });

  it("should URL-encode the token", () => {
    expect(buildConfirmationLink("https://x.test", "a b&c")).toBe(
      "https://x.test/subscriptions/confirm?token=a%20b%26c"
    );
  });
});

describe("buildConfirmationEmail", () => {
  const expiresAt = 1_700_000_060_000;
  const link = "https://news.example.com/subscriptions/confirm?token=t&x=1";

  it("should render the subject, link and expiry", () => {
    const email = buildConfirmationEmail({
      recipient: { email: "ada@example.com", name: "Ada" },
      link,
      expiresAt,
    });

    expect(email.subject).toBe(CONFIRMATION_SUBJECT);
    expect(email.text).toBe(
      "Hi Ada,\n\n" +
        `Welcome to our newsletter! Visit ${link} to confirm your subscription.\n\n` +
        "This link expires on Tue, 14 Nov 2023 22:14:20 GMT."
    );
    expect(email.html).toBe(
      "<p>Hi Ada,</p>" +
        '<p>Welcome to our newsletter! Please <a href="https://news.example.com/subscriptions/confirm?token=t&amp;x=1">confirm your subscription</a>.</p>' +
        "<p>This link expires on Tue, 14 Nov 2023 22:14:20 GMT.</p>"
    );
  });

  it("should escape the recipient name in HTML only", () => {
    const email = buildConfirmationEmail({
      recipient: { email: "eve@example.com", name: "<Eve>" },
      link,
      expiresAt,
    });

    expect(email.html.startsWith("<p>Hi &lt;Eve&gt;,</p>")).toBe(true);
    expect(email.text.startsWith("Hi <Eve>,\n")).toBe(true);
  });
});

describe("buildIssueEmail", () => {
  const issue = {
    version: "2024-06",
    subject: "June news for {{name}}",
    html: "<h1>Hello {{name}}</h1><p>Sent to {{email}}</p>",
    text: "Hello {{name}}, sent to {{email}}. {{unknown}} stays.",
  };

  it("should interpolate recipient variables", () => {
    const email = buildIssueEmail(issue, { email: "ada@example.com", name: "Ada" });

    expect(email).toEqual({
      subject: "June news for Ada",
      html: "<h1>Hello Ada</h1><p>Sent to ada@example.com</p>",
      text: "Hello Ada, sent to ada@example.com. {{unknown}} stays.",
    });
  });

  it("should escape variables in the HTML body", () => {
    const email = buildIssueEmail(issue, { email: "tom@example.com", name: "Tom & <Jerry>" });

    expect(email.html).toBe("<h1>Hello Tom &amp; &lt;Jerry&gt;</h1><p>Sent to tom@example.com</p>");
    expect(email.text).toBe("Hello Tom & <Jerry>, sent to tom@example.com. {{unknown}} stays.");
  });
});

describe("interpolateVariables", () => {
  it("should return text unchanged without variables", () => {
    expect(interpolateVariables("Hi {{name}}")).toBe("Hi {{name}}");
  });

  it("should not resolve inherited object properties", () => {
    expect(interpolateVariables("{{constructor}}", { name: "x" })).toBe("{{constructor}}");
  });
});

describe("escapeHtml", () => {
  it("should escape all HTML-significant characters", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
  });
});
