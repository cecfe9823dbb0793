import { summarizePlayer } from "../metrics/player.js";
import { summarizeSeason } from "../metrics/season.js";
import {
  headToHead,
  seasonWinLoss,
  seasonWinPercentage,
  teamRecord,
  teamResultTypes,
  tossOutcomes,
} from "../metrics/team.js";
import { summarizeVenue } from "../metrics/venue.js";
import type { Dataset, EntityCategory, MetricBundle, RecordSubset } from "../types.js";
import { BundleBuilder, alignSeries, type Side } from "./bundle.js";

export interface Subject {
  value: string;
  records: RecordSubset;
}

export interface ViewContext {
  dataset: Dataset;
  primary: Subject;
  secondary?: Subject;
  venueTopTeams: number;
  comparativeTopTeams: number;
}

export type SortDirection = "asc" | "desc";

export interface CategoryViews {
  overview(ctx: ViewContext): MetricBundle;
  trend(ctx: ViewContext): MetricBundle;
  results(ctx: ViewContext): MetricBundle;
  comparative(ctx: ViewContext, secondary: Subject): MetricBundle;
  recordsOrder: SortDirection;
}

function subjects(ctx: ViewContext): Array<[Side, Subject]> {
  return ctx.secondary
    ? [
        ["primary", ctx.primary],
        ["secondary", ctx.secondary],
      ]
    : [["primary", ctx.primary]];
}

const playerViews: CategoryViews = {
  overview(ctx) {
    const summary = summarizePlayer(ctx.primary.records);
    return new BundleBuilder()
      .count("awards", summary.awards)
      .count("teamsInvolved", summary.teamsInvolved)
      .date("firstAward", summary.firstAward)
      .series("awardsBySeason", summary.awardsBySeason)
      .build();
  },
  trend(ctx) {
    const builder = new BundleBuilder();
    for (const [side, subject] of subjects(ctx)) {
      builder.forSide(side).series("awardsBySeason", summarizePlayer(subject.records).awardsBySeason);
    }
    return builder.build();
  },
  results(ctx) {
    const summary = summarizePlayer(ctx.primary.records);
    return new BundleBuilder()
      .series("resultTypes", summary.resultTypes)
      .distribution("resultMargins", summary.marginDistribution)
      .build();
  },
  comparative(ctx, secondary) {
    const first = summarizePlayer(ctx.primary.records);
    const second = summarizePlayer(secondary.records);
    const [firstSeries, secondSeries] = alignSeries(first.awardsBySeason, second.awardsBySeason);
    const builder = new BundleBuilder();
    builder.forSide("primary").count("awards", first.awards).series("awardsBySeason", firstSeries);
    builder
      .forSide("secondary")
      .count("awards", second.awards)
      .series("awardsBySeason", secondSeries);
    return builder.build();
  },
  recordsOrder: "desc",
};

const teamViews: CategoryViews = {
  overview(ctx) {
    const team = ctx.primary.value;
    const record = teamRecord(team, ctx.primary.records);
    const perSeason = seasonWinLoss(team, ctx.primary.records);
    return new BundleBuilder()
      .count("totalMatches", record.totalMatches)
      .count("wins", record.wins)
      .percent("winPercentage", record.winPercentage)
      .series("winsBySeason", perSeason.wins)
      .series("lossesBySeason", perSeason.losses)
      .build();
  },
  trend(ctx) {
    const builder = new BundleBuilder();
    for (const [side, subject] of subjects(ctx)) {
      builder
        .forSide(side)
        .series("winPercentageBySeason", seasonWinPercentage(subject.value, subject.records));
    }
    return builder.build();
  },
  results(ctx) {
    const team = ctx.primary.value;
    return new BundleBuilder()
      .crossTab("tossOutcomes", tossOutcomes(team, ctx.primary.records))
      .series("resultTypes", teamResultTypes(team, ctx.primary.records))
      .build();
  },
  comparative(ctx, secondary) {
    const builder = new BundleBuilder();
    for (const [side, subject] of subjects({ ...ctx, secondary })) {
      const record = teamRecord(subject.value, subject.records);
      builder
        .forSide(side)
        .count("totalMatches", record.totalMatches)
        .count("wins", record.wins)
        .percent("winPercentage", record.winPercentage);
    }
    const h2h = headToHead(ctx.dataset, ctx.primary.value, secondary.value);
    return builder
      .count("headToHeadMatches", h2h.directMatches)
      .count("headToHeadNoDecision", h2h.noDecision)
      .series("headToHeadWins", h2h.wins)
      .build();
  },
  recordsOrder: "desc",
};

const venueViews: CategoryViews = {
  overview(ctx) {
    const summary = summarizeVenue(ctx.primary.records, ctx.venueTopTeams);
    return new BundleBuilder()
      .count("totalMatches", summary.totalMatches)
      .text("city", summary.city)
      .date("firstMatch", summary.firstMatch)
      .mean("averageTargetRuns", summary.averageTargetRuns)
      .series("resultShares", summary.resultShares)
      .build();
  },
  trend(ctx) {
    const builder = new BundleBuilder();
    for (const [side, subject] of subjects(ctx)) {
      builder
        .forSide(side)
        .series("matchesBySeason", summarizeVenue(subject.records).matchesBySeason);
    }
    return builder.build();
  },
  results(ctx) {
    const summary = summarizeVenue(ctx.primary.records, ctx.venueTopTeams);
    return new BundleBuilder()
      .series("topTeams", summary.topTeams)
      .crossTab("resultsBySeason", summary.resultsBySeason)
      .distribution("resultMargins", summary.marginDistribution)
      .build();
  },
  comparative(ctx, secondary) {
    const builder = new BundleBuilder();
    for (const [side, subject] of subjects({ ...ctx, secondary })) {
      const summary = summarizeVenue(subject.records);
      builder
        .forSide(side)
        .count("totalMatches", summary.totalMatches)
        .mean("averageTargetRuns", summary.averageTargetRuns)
        .distribution("resultMargins", summary.marginDistribution);
    }
    return builder.build();
  },
  recordsOrder: "desc",
};

const seasonViews: CategoryViews = {
  overview(ctx) {
    const summary = summarizeSeason(ctx.primary.records);
    return new BundleBuilder()
      .count("totalMatches", summary.totalMatches)
      .count("teams", summary.teams)
      .count("superOvers", summary.superOvers)
      .series("winsByTeam", summary.winsByTeam)
      .build();
  },
  trend(ctx) {
    const builder = new BundleBuilder();
    for (const [side, subject] of subjects(ctx)) {
      const summary = summarizeSeason(subject.records);
      builder
        .forSide(side)
        .mean("averageTargetRuns", summary.averageTargetRuns)
        .mean("averageResultMargin", summary.averageResultMargin);
    }
    return builder.build();
  },
  results(ctx) {
    const summary = summarizeSeason(ctx.primary.records);
    return new BundleBuilder()
      .distribution("resultMargins", summary.marginDistribution)
      .points("targetVsMargin", summary.targetVsMargin)
      .build();
  },
  comparative(ctx, secondary) {
    const builder = new BundleBuilder();
    for (const [side, subject] of subjects({ ...ctx, secondary })) {
      const summary = summarizeSeason(subject.records);
      builder
        .forSide(side)
        .count("totalMatches", summary.totalMatches)
        .mean("averageTargetRuns", summary.averageTargetRuns)
        .count("superOvers", summary.superOvers)
        .series("topTeams", summary.winsByTeam.slice(0, ctx.comparativeTopTeams));
    }
    return builder.build();
  },
  // Season records read chronologically; the other categories list newest first.
  recordsOrder: "asc",
};

export const CATEGORY_VIEWS: Record<EntityCategory, CategoryViews> = {
  Player: playerViews,
  Team: teamViews,
  Venue: venueViews,
  Season: seasonViews,
};
