// pattern: Functional Core
import { z } from "zod";
import type { FeedItem, FeedNotice } from "../watch/types";
import { formatResource } from "../watch/types";

const issueRef = z.object({ number: z.number(), title: z.string().optional() });

const pushPayload = z.object({
  ref: z.string(),
  size: z.number().optional(),
  commits: z.array(z.unknown()).optional(),
});
const issuesPayload = z.object({ action: z.string(), issue: issueRef });
const commentBody = z.object({ body: z.string().nullable().optional() });
const issueCommentPayload = z.object({
  action: z.string(),
  issue: issueRef,
  comment: commentBody.optional(),
});
const pullRequestPayload = z.object({
  action: z.string(),
  number: z.number(),
  pull_request: z.object({ title: z.string().optional() }).optional(),
});
const reviewCommentPayload = z.object({
  action: z.string(),
  pull_request: z.object({ number: z.number(), title: z.string().optional() }),
  comment: commentBody.optional(),
});
const refPayload = z.object({
  ref_type: z.string(),
  ref: z.string().nullable().optional(),
});
const forkPayload = z.object({ forkee: z.object({ full_name: z.string() }) });
const releasePayload = z.object({
  action: z.string(),
  release: z.object({ tag_name: z.string() }),
});
const gollumPayload = z.object({
  pages: z.array(z.object({ action: z.string(), title: z.string() })),
});
const memberPayload = z.object({
  action: z.string(),
  member: z.object({ login: z.string() }),
});
const statusPayload = z.object({ sha: z.string(), state: z.string() });
const commitCommentPayload = z.object({
  comment: z.object({ commit_id: z.string() }),
});

function withTitle(text: string, title: string | undefined): string {
  return title ? `${text}: ${title}` : text;
}

const EXCERPT_LENGTH = 80;

/** First line of a comment body, cut to fit on one line. */
function excerpt(body: string): string {
  const [firstLine = ""] = body.trim().split(/\r?\n/);
  return firstLine.length > EXCERPT_LENGTH
    ? `${firstLine.slice(0, EXCERPT_LENGTH - 3)}...`
    : firstLine;
}

function withComment(
  text: string,
  title: string | undefined,
  body: string | null | undefined,
): string {
  const quoted = body ? excerpt(body) : "";
  if (!quoted) return withTitle(text, title);
  return `${title ? `${text} (${title})` : text}: ${quoted}`;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * One-line description of what an event did, or null when the payload does
 * not have the shape expected for its type.
 */
export function describeEvent(item: FeedItem): string | null {
  const payload = item.payload;

  switch (item.type) {
    case "PushEvent": {
      const p = pushPayload.safeParse(payload);
      if (!p.success) return null;
      const size = p.data.size ?? p.data.commits?.length;
      return size === undefined
        ? `pushed to ${p.data.ref}`
        : `pushed ${plural(size, "commit")} to ${p.data.ref}`;
    }
    case "IssuesEvent": {
      const p = issuesPayload.safeParse(payload);
      if (!p.success) return null;
      return withTitle(`${p.data.action} issue #${p.data.issue.number}`, p.data.issue.title);
    }
    case "IssueCommentEvent": {
      const p = issueCommentPayload.safeParse(payload);
      if (!p.success) return null;
      return withComment(
        `${p.data.action} a comment on #${p.data.issue.number}`,
        p.data.issue.title,
        p.data.comment?.body,
      );
    }
    case "PullRequestEvent": {
      const p = pullRequestPayload.safeParse(payload);
      if (!p.success) return null;
      return withTitle(
        `${p.data.action} pull request #${p.data.number}`,
        p.data.pull_request?.title,
      );
    }
    case "PullRequestReviewCommentEvent": {
      const p = reviewCommentPayload.safeParse(payload);
      if (!p.success) return null;
      return withComment(
        `${p.data.action} a review comment on pull request #${p.data.pull_request.number}`,
        p.data.pull_request.title,
        p.data.comment?.body,
      );
    }
    case "CreateEvent":
    case "DeleteEvent": {
      const p = refPayload.safeParse(payload);
      if (!p.success) return null;
      const verb = item.type === "CreateEvent" ? "created" : "deleted";
      return p.data.ref ? `${verb} ${p.data.ref_type} ${p.data.ref}` : `${verb} ${p.data.ref_type}`;
    }
    case "ForkEvent": {
      const p = forkPayload.safeParse(payload);
      if (!p.success) return null;
      return `forked to ${p.data.forkee.full_name}`;
    }
    case "WatchEvent":
      return "starred the repository";
    case "PublicEvent":
      return "made the repository public";
    case "ReleaseEvent": {
      const p = releasePayload.safeParse(payload);
      if (!p.success) return null;
      return `${p.data.action} release ${p.data.release.tag_name}`;
    }
    case "GollumEvent": {
      const p = gollumPayload.safeParse(payload);
      if (!p.success) return null;
      return `updated the wiki: ${p.data.pages.map((page) => `${page.action} ${page.title}`).join(", ")}`;
    }
    case "MemberEvent": {
      const p = memberPayload.safeParse(payload);
      if (!p.success) return null;
      return `${p.data.action} collaborator ${p.data.member.login}`;
    }
    case "CommitCommentEvent": {
      const p = commitCommentPayload.safeParse(payload);
      if (!p.success) return null;
      return `commented on commit ${p.data.comment.commit_id.slice(0, 7)}`;
    }
    case "StatusEvent": {
      const p = statusPayload.safeParse(payload);
      if (!p.success) return null;
      return `marked commit ${p.data.sha.slice(0, 7)} as ${p.data.state}`;
    }
    default:
      return null;
  }
}

export function formatEvent(item: FeedItem): string {
  const description = describeEvent(item) ?? item.type;
  return `#${item.id} ${item.repo} ${item.actor} ${description}`;
}

export function formatNotice(notice: FeedNotice): string {
  const remaining = notice.remaining === null ? "unknown" : String(notice.remaining);
  const what =
    notice.kind === "new-events"
      ? `${plural(notice.count, "new event")} on`
      : "no new events on";
  return `${notice.at.toISOString()} ${what} ${formatResource(notice.resource)} (remaining: ${remaining})`;
}
