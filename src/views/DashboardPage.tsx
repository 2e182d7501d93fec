import { renderToStaticMarkup } from 'react-dom/server';
import type { Team } from '../types/tournament';

interface DashboardPageProps {
  teams: readonly Team[];
  lastUpdated: string | null;
}

function TeamColumn({ team }: { team: Team }) {
  return (
    <section className="team-card" style={{ borderTopColor: team.color }}>
      <header className="team-card__title">
        <span className="swatch" style={{ background: team.color }} />
        {team.name}
      </header>
      <ul className="dropzone" id={`team-${team.name}`} data-team={team.name} />
    </section>
  );
}

export function DashboardPage({ teams, lastUpdated }: DashboardPageProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>Team Balancer</title>
        <link rel="stylesheet" href="/assets/dashboard.css" />
      </head>
      <body data-teams={JSON.stringify(teams.map(team => team.name))}>
        <aside className="panel panel--left">
          <h1 className="app-title">Team Balancer</h1>
          <p className="muted">
            Stats last updated: <span id="last-updated">{lastUpdated ?? 'never'}</span>
          </p>

          <label className="section-label" htmlFor="pool-input">Players</label>
          <textarea id="pool-input" placeholder="One player per line" />
          <div className="button-row">
            <button type="button" id="load-pool">Load pool</button>
            <button type="button" id="clear-teams" className="secondary">Clear teams</button>
          </div>
          <ul className="dropzone pool" id="pool" data-team="" />

          <div className="button-row">
            <button type="button" id="recalc">Recalculate</button>
            <button type="button" id="export" className="secondary">Export CSV</button>
            <button type="button" id="reset-resolutions" className="secondary">Reset substitutions</button>
          </div>
          <p className="status" id="status" role="status" />
        </aside>

        <main className="panel panel--right">
          <div className="teams">
            {teams.map(team => (
              <TeamColumn key={team.name} team={team} />
            ))}
          </div>

          <ul className="legend">
            {teams.map(team => (
              <li key={team.name}>
                <span className="swatch" style={{ background: team.color }} />
                {team.name}
              </li>
            ))}
          </ul>

          <section className="chart-panel">
            <h2 className="section-label">Average points per player</h2>
            <div id="per-game-chart" />
          </section>
          <section className="chart-panel">
            <h2 className="section-label">Team total vs field average</h2>
            <div id="diff-chart" />
          </section>
        </main>

        <dialog id="resolve-dialog">
          <form method="dialog" id="resolve-form">
            <h2>Players without stats</h2>
            <p className="muted">
              Enter a substitute whose stats should count, or leave blank to ignore the player in every game.
            </p>
            <div id="resolve-fields" />
            <datalist id="player-candidates" />
            <div className="button-row">
              <button type="submit" value="apply">Apply</button>
              <button type="submit" value="cancel" className="secondary">Cancel</button>
            </div>
          </form>
        </dialog>

        <script src="/assets/dashboard.js" defer />
      </body>
    </html>
  );
}

export function renderDashboardPage(props: DashboardPageProps): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(<DashboardPage {...props} />)}`;
}
