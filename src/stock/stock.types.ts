export interface StockSummary {
    productId: string;
    productName: string;
    sellableQuantity: number;
}

export interface StockLevel extends StockSummary {
    // Every unit still in a batch, expired ones included
    onHandQuantity: number;
    asOf: string;
}
