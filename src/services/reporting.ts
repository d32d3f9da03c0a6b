import { DepositView, LedgerStore, LedgerTotals, MaterialBreakdown, PeriodTotals, SystemStats } from "../models/store";
import { AggregateProjector } from "./projector";

const RECENT_DEPOSITS = 5;
const MONTHLY_WINDOW_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface UserSummary {
    totals: LedgerTotals;
    depositsCount: number;
    favoriteMaterial: string | null;
    recentDeposits: DepositView[];
    last30Days: PeriodTotals;
    breakdown: MaterialBreakdown[];
    rank: number;
}

export interface HistoryFilter {
    material?: string;
    dateFrom?: Date; // first UTC day included
    dateTo?: Date; // last UTC day included
    page: number;
}

export interface HistoryPage {
    deposits: DepositView[];
    currentPage: number;
    totalPages: number;
    totalDeposits: number;
    hasNext: boolean;
    hasPrevious: boolean;
}

export class ReportingService {
    constructor(
        private readonly store: LedgerStore,
        private readonly projector: AggregateProjector,
        private readonly pageSize: number,
        private readonly now: () => Date = () => new Date()
    ) {}

    /** 1 + the number of users holding strictly more points. */
    async rankOf(totals: LedgerTotals): Promise<number> {
        return (await this.store.countUsersAbove(totals.centiPoints)) + 1;
    }

    async userSummary(userId: string): Promise<UserSummary> {
        const totals = await this.projector.getUserTotals(userId);
        const breakdown = await this.store.materialBreakdown(userId);
        const recent = await this.store.listDeposits({ userId, offset: 0, limit: RECENT_DEPOSITS });
        const last30Days = await this.store.totalsSince(userId, new Date(this.now().getTime() - MONTHLY_WINDOW_DAYS * DAY_MS));
        return {
            totals,
            depositsCount: recent.total,
            favoriteMaterial: breakdown[0]?.materialName ?? null,
            recentDeposits: recent.deposits,
            last30Days,
            breakdown,
            rank: await this.rankOf(totals)
        };
    }

    async depositHistory(userId: string, filter: HistoryFilter): Promise<HistoryPage> {
        const query = {
            userId,
            material: filter.material,
            dateFrom: filter.dateFrom,
            dateTo: filter.dateTo && new Date(filter.dateTo.getTime() + DAY_MS),
            limit: this.pageSize
        };
        let page = Math.max(1, Math.floor(filter.page));
        let result = await this.store.listDeposits({ ...query, offset: (page - 1) * this.pageSize });
        const totalPages = Math.max(1, Math.ceil(result.total / this.pageSize));
        if (page > totalPages) {
            // past the end: serve the last page
            page = totalPages;
            result = await this.store.listDeposits({ ...query, offset: (page - 1) * this.pageSize });
        }
        return {
            deposits: result.deposits,
            currentPage: page,
            totalPages,
            totalDeposits: result.total,
            hasNext: page < totalPages,
            hasPrevious: page > 1
        };
    }

    systemStats(): Promise<SystemStats> {
        return this.store.systemStats();
    }
}
