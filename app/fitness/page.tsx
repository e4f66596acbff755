import FitnessLog from '@/components/FitnessLog';

export default function FitnessPage() {
  return (
    <div>
      <h1>Physical test log</h1>
      <FitnessLog />
    </div>
  );
}
