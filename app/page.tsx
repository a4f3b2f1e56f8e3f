import PortfolioDashboard from '@/components/PortfolioDashboard';

export default function Home() {
  return (
    <main className="min-h-screen bg-gray-50">
      <div className="container mx-auto px-4 py-10">
        <div className="mb-8">
          <h1 className="text-3xl font-bold mb-2">Portfolio Suggester</h1>
          <p className="text-gray-600">
            Turn an investment amount and one or two strategies into whole-share holdings.
          </p>
        </div>
        <PortfolioDashboard />
      </div>
    </main>
  );
}
