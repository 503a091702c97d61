export interface BattleRecord {
    readonly timestamp: Date;
    readonly opponent: string;
    readonly wins: number;
    readonly draws: number;
    readonly losses: number;
}

export interface BattleTotals {
    wins: number;
    draws: number;
    losses: number;
}

export interface PymonBattleReport {
    nickname: string;
    battles: readonly BattleRecord[];
    totals: BattleTotals;
}

/**
 * Append-only battle history, keyed by Pymon nickname.
 */
export class BattleStats {
    private readonly battles = new Map<string, BattleRecord[]>();

    constructor(private readonly clock: () => Date = () => new Date()) {}

    record(nickname: string, opponent: string, wins: number, draws: number, losses: number): BattleRecord {
        const entry: BattleRecord = Object.freeze({
            timestamp: this.clock(),
            opponent,
            wins,
            draws,
            losses
        });
        const history = this.battles.get(nickname);
        if (history) {
            history.push(entry);
        } else {
            this.battles.set(nickname, [entry]);
        }
        return entry;
    }

    history(nickname: string): readonly BattleRecord[] {
        return [...(this.battles.get(nickname) ?? [])];
    }

    /**
     * One report per nickname, in the order nicknames first battled.
     */
    report(): PymonBattleReport[] {
        const reports: PymonBattleReport[] = [];
        for (const [nickname, battles] of this.battles) {
            const totals: BattleTotals = { wins: 0, draws: 0, losses: 0 };
            for (const battle of battles) {
                totals.wins += battle.wins;
                totals.draws += battle.draws;
                totals.losses += battle.losses;
            }
            reports.push({ nickname, battles: [...battles], totals });
        }
        return reports;
    }
}
